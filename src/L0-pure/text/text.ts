import slugifyLib from 'slugify'

/** URL/folder-safe slug: lowercase, hyphen-separated, no special characters. */
export function slugify(text: string): string {
  return slugifyLib(text, { lower: true, strict: true })
}

/** Format seconds as `m:ss.s` for log lines and tables. */
export function formatTimestamp(seconds: number): string {
  const minutes = Math.floor(seconds / 60)
  const rest = seconds - minutes * 60
  return `${minutes}:${rest.toFixed(1).padStart(4, '0')}`
}
