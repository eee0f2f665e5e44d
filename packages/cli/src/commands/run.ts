import { logger } from '@blockmem/core'
import { ConfigService, MainService } from '@blockmem/node'
import { Command } from 'commander'
import {
  isCoalescePolicy,
  isLogLevel,
  isPositiveIntegerString,
} from '../utils/validation'

export interface RunCommandOptions {
  blocks?: string
  blockSize?: string
  minRequest?: string
  maxRequest?: string
  tickMs?: string
  coalescePolicy?: string
  duration?: string
  verifyInvariants?: boolean
  env?: string
  logLevel?: string
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Run the block memory simulation until interrupted')
    .option(
      '--blocks <number>',
      'Initial number of equal-size blocks (BLOCK_COUNT)',
    )
    .option(
      '--block-size <number>',
      'Uniform initial block size in units (BLOCK_SIZE)',
    )
    .option(
      '--min-request <number>',
      'Smallest random request size (MIN_REQUEST_SIZE)',
    )
    .option(
      '--max-request <number>',
      'Largest random request size (MAX_REQUEST_SIZE)',
    )
    .option(
      '--tick-ms <number>',
      'Length of one actor tick in milliseconds (TICK_MS)',
    )
    .option(
      '--coalesce-policy <policy>',
      'Fragment merge policy: "reservoir" or "adjacent" (COALESCE_POLICY)',
    )
    .option('--duration <ms>', 'Stop on its own after this many milliseconds')
    .option('--verify-invariants', 'Check memory invariants after every tick')
    .option('--env <path>', 'Path of a .env file to load')
    .option('--log-level <level>', 'trace, debug, info, warn or error')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await executeRunCommand(options)
    })

  return command
}

/**
 * Map CLI flags onto the environment variables they override
 */
export function toEnvOverrides(
  options: RunCommandOptions,
): Record<string, string | undefined> {
  return {
    BLOCK_COUNT: options.blocks,
    BLOCK_SIZE: options.blockSize,
    MIN_REQUEST_SIZE: options.minRequest,
    MAX_REQUEST_SIZE: options.maxRequest,
    TICK_MS: options.tickMs,
    COALESCE_POLICY: options.coalescePolicy,
    VERIFY_INVARIANTS: options.verifyInvariants ? 'true' : undefined,
    LOG_LEVEL: options.logLevel,
  }
}

/**
 * Collect every flag that is malformed before any configuration is loaded
 */
export function validateRunOptions(options: RunCommandOptions): string[] {
  const problems: string[] = []
  const numeric: Array<[string, string | undefined]> = [
    ['--blocks', options.blocks],
    ['--block-size', options.blockSize],
    ['--min-request', options.minRequest],
    ['--max-request', options.maxRequest],
    ['--tick-ms', options.tickMs],
    ['--duration', options.duration],
  ]
  for (const [flag, value] of numeric) {
    if (value !== undefined && !isPositiveIntegerString(value)) {
      problems.push(`${flag} must be a positive integer, got '${value}'`)
    }
  }
  if (
    options.coalescePolicy !== undefined &&
    !isCoalescePolicy(options.coalescePolicy)
  ) {
    problems.push(
      "--coalesce-policy must be 'reservoir' or 'adjacent', " +
        `got '${options.coalescePolicy}'`,
    )
  }
  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    problems.push(`--log-level '${options.logLevel}' is not a known level`)
  }
  return problems
}

/**
 * Run the simulation and resolve to the process exit code
 */
export async function executeRunCommand(
  options: RunCommandOptions,
): Promise<number> {
  const problems = validateRunOptions(options)
  if (problems.length > 0) {
    logger.error('Invalid command line options', undefined, { problems })
    return 1
  }

  const [configError, configService] = ConfigService.load(
    toEnvOverrides(options),
    options.env,
  )
  if (configError) {
    logger.error('Invalid configuration', configError, {
      issues: configError.issues,
    })
    return 1
  }

  // --log-level reaches the config through LOG_LEVEL, .env below it
  logger.init(configService.logLevel)

  const controller = new AbortController()
  const onSignal = () => controller.abort()
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const mainService = new MainService({ configService })
    const [runError, reason] = await mainService.run({
      durationMs:
        options.duration !== undefined ? Number(options.duration) : undefined,
      signal: controller.signal,
    })
    if (runError) {
      logger.error('Simulation failed', runError)
      return 1
    }
    logger.info('Simulation finished', { reason: reason.kind })
    return 0
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}
