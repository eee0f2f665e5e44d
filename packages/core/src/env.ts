import { config as dotenvConfig } from 'dotenv'
import { TIMING_CONSTANTS } from '@blockmem/types'
import { z } from 'zod'

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive())

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Startup parameters of the simulator, one variable per parameter
 */
export const simulationEnvSchema = baseEnvSchema
  .extend({
    BLOCK_COUNT: positiveInt('3'),
    BLOCK_SIZE: positiveInt('1024'),
    ARENA_CAPACITY: positiveInt('4096'),
    MIN_REQUEST_SIZE: positiveInt('10'),
    MAX_REQUEST_SIZE: positiveInt('50'),
    TICK_MS: positiveInt('1000').pipe(
      z.number().max(TIMING_CONSTANTS.MAX_TIMER_DELAY_MS),
    ),
    ALLOCATION_TICKS: positiveInt('1'),
    RECLAMATION_TICKS: positiveInt('2'),
    AGING_TICKS: positiveInt('1'),
    INSPECTION_TICKS: positiveInt('5'),
    COALESCE_POLICY: z.enum(['reservoir', 'adjacent']).default('reservoir'),
    // coerce.boolean treats 'false' as true
    VERIFY_INVARIANTS: z
      .enum(['true', 'false'])
      .default('false')
      .transform((x) => x === 'true'),
  })
  .refine((env) => env.MIN_REQUEST_SIZE <= env.MAX_REQUEST_SIZE, {
    message: 'MIN_REQUEST_SIZE must not exceed MAX_REQUEST_SIZE',
    path: ['MIN_REQUEST_SIZE'],
  })
  .refine((env) => env.BLOCK_COUNT <= env.ARENA_CAPACITY, {
    message: 'BLOCK_COUNT must not exceed ARENA_CAPACITY',
    path: ['BLOCK_COUNT'],
  })
  .refine(
    (env) =>
      env.TICK_MS *
        Math.max(
          env.ALLOCATION_TICKS,
          env.RECLAMATION_TICKS,
          env.AGING_TICKS,
          env.INSPECTION_TICKS,
        ) <=
      TIMING_CONSTANTS.MAX_TIMER_DELAY_MS,
    {
      message: 'Actor intervals (*_TICKS x TICK_MS) exceed the timer limit',
      path: ['TICK_MS'],
    },
  )

export type SimulationEnv = z.infer<typeof simulationEnvSchema>

/**
 * Validate an explicit variable map without touching process.env
 */
export function parseSimulationEnv(
  source: Record<string, string | undefined>,
) {
  return simulationEnvSchema.safeParse(source)
}

/**
 * Load the .env file, then validate process.env with `overrides` layered on
 * top. Overrides that are undefined leave the environment value in place.
 * @param overrides - Values that win over the environment (e.g. CLI flags)
 * @param envPath - Optional path to .env file
 */
export function loadSimulationEnv(
  overrides: Record<string, string | undefined> = {},
  envPath?: string,
) {
  dotenvConfig({ path: envPath })

  const source: Record<string, string | undefined> = { ...process.env }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      source[key] = value
    }
  }
  return parseSimulationEnv(source)
}
