import { Command, InvalidArgumentError } from '../L1-infra/cli/cli.js'
import { initConfig } from '../L1-infra/config/environment.js'
import type { CLIOptions } from '../L1-infra/config/environment.js'
import logger, { setVerbose } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { DEFAULT_SHORTS_COUNT, DEFAULT_SHORTS_DURATION } from '../L6-pipeline/pipeline.js'
import { runAnalyze } from './commands/analyze.js'
import { runCacheClear, runCacheStats } from './commands/cache.js'

function readVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

const version = readVersion()

const BANNER = `
╔══════════════════════════════════════╗
║   SegmentScout  v${version.padEnd(20)}║
╚══════════════════════════════════════╝
`

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function positiveFloat(value: string): number {
  const parsed = Number.parseFloat(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.')
  }
  return parsed
}

interface AnalyzeFlags {
  count: number
  duration: number
  outputDir?: string
  cacheDir?: string
  cache: boolean
  config?: string
  workers?: number
  interval?: number
  openaiKey?: string
  verbose?: boolean
}

const program = new Command()

program
  .name('segmentscout')
  .description('Find the most engaging segments of a long video from audio, visual and speech signals')
  .version(version, '-V, --version')

const analyzeCmd = program
  .command('analyze', { isDefault: true })
  .argument('<video-path>', 'Path to the video file to analyze')
  .option('-n, --count <number>', 'Number of segments to select', positiveInt, DEFAULT_SHORTS_COUNT)
  .option('-d, --duration <seconds>', 'Length of each segment in seconds', positiveInt, DEFAULT_SHORTS_DURATION)
  .option('--output-dir <path>', 'Folder for analysis reports (default: ./analysis)')
  .option('--cache-dir <path>', 'Folder for cached modality analyses (default: ./temp/cache)')
  .option('--no-cache', 'Ignore and do not write the analysis cache')
  .option('--config <path>', 'Path to engagement.json scoring config (default: ./engagement.json)')
  .option('--workers <number>', 'Modality analyses to run at once (default: 3)', positiveInt)
  .option('--interval <seconds>', 'Timeline resolution in seconds (default: 1)', positiveFloat)
  .option('--openai-key <key>', 'OpenAI API key for speech transcription (default: env OPENAI_API_KEY)')
  .option('-v, --verbose', 'Verbose logging')
  .action(async (videoPath: string) => {
    const opts = analyzeCmd.opts<AnalyzeFlags>()

    const cliOptions: CLIOptions = {
      outputDir: opts.outputDir,
      cacheDir: opts.cacheDir,
      cache: opts.cache === false ? false : undefined,
      config: opts.config,
      workers: opts.workers,
      interval: opts.interval,
      openaiKey: opts.openaiKey,
      verbose: opts.verbose,
    }

    logger.info(BANNER)
    const config = initConfig(cliOptions)
    if (opts.verbose) setVerbose()
    if (!config.OPENAI_API_KEY) {
      logger.warn('OPENAI_API_KEY is not set — speech analysis will fail and be scored as empty')
    }

    logger.info(`Output dir: ${config.OUTPUT_DIR}`)
    logger.info(`Cache dir:  ${config.CACHE_ENABLED ? config.CACHE_DIR : 'disabled'}`)

    process.exitCode = await runAnalyze(videoPath, { count: opts.count, duration: opts.duration })
  })

const cacheCmd = program
  .command('cache')
  .description('Inspect or clear the modality analysis cache')
  .option('--cache-dir <path>', 'Cache folder (default: ./temp/cache)')

cacheCmd
  .command('clear')
  .description('Delete every cached analysis')
  .action(async () => {
    initConfig({ cacheDir: cacheCmd.opts<{ cacheDir?: string }>().cacheDir })
    await runCacheClear()
  })

cacheCmd
  .command('stats')
  .description('Show the number and size of cached analyses')
  .action(async () => {
    initConfig({ cacheDir: cacheCmd.opts<{ cacheDir?: string }>().cacheDir })
    await runCacheStats()
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err)
  logger.error(`Fatal: ${message}`)
  process.exit(1)
})
