import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from '@blockmem/core'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createRunCommand,
  executeRunCommand,
  toEnvOverrides,
  validateRunOptions,
} from '../commands/run'
import {
  isCoalescePolicy,
  isLogLevel,
  isPositiveIntegerString,
} from '../utils/validation'

describe('blockmem CLI Arguments', () => {
  describe('Validation Functions', () => {
    it('should validate positive integer strings correctly', () => {
      expect(isPositiveIntegerString('1')).toBe(true)
      expect(isPositiveIntegerString('1024')).toBe(true)
      expect(isPositiveIntegerString('0')).toBe(false)
      expect(isPositiveIntegerString('-3')).toBe(false)
      expect(isPositiveIntegerString('2.5')).toBe(false)
      expect(isPositiveIntegerString('1e3')).toBe(false)
      expect(isPositiveIntegerString('')).toBe(false)
      expect(isPositiveIntegerString('99999999999999999999')).toBe(false) // unsafe
    })

    it('should validate coalesce policies and log levels', () => {
      expect(isCoalescePolicy('reservoir')).toBe(true)
      expect(isCoalescePolicy('adjacent')).toBe(true)
      expect(isCoalescePolicy('best-fit')).toBe(false)
      expect(isLogLevel('warn')).toBe(true)
      expect(isLogLevel('verbose')).toBe(false)
    })
  })

  describe('Run Command Options', () => {
    it('should have every simulation flag', () => {
      const command = createRunCommand()
      const options = command.options.map((opt) => opt.long)

      expect(options).toEqual([
        '--blocks',
        '--block-size',
        '--min-request',
        '--max-request',
        '--tick-ms',
        '--coalesce-policy',
        '--duration',
        '--verify-invariants',
        '--env',
        '--log-level',
      ])
    })

    it('should parse flags into camel-cased options', () => {
      const command = createRunCommand().action(() => {})

      command.parse(
        [
          '--blocks',
          '5',
          '--block-size',
          '64',
          '--coalesce-policy',
          'adjacent',
          '--verify-invariants',
        ],
        { from: 'user' },
      )

      expect(command.opts()).toEqual({
        blocks: '5',
        blockSize: '64',
        coalescePolicy: 'adjacent',
        verifyInvariants: true,
      })
    })

    it('should map flags onto environment overrides', () => {
      expect(
        toEnvOverrides({
          blocks: '5',
          tickMs: '25',
          verifyInvariants: true,
          logLevel: 'debug',
        }),
      ).toEqual({
        BLOCK_COUNT: '5',
        BLOCK_SIZE: undefined,
        MIN_REQUEST_SIZE: undefined,
        MAX_REQUEST_SIZE: undefined,
        TICK_MS: '25',
        COALESCE_POLICY: undefined,
        VERIFY_INVARIANTS: 'true',
        LOG_LEVEL: 'debug',
      })
    })

    it('should leave VERIFY_INVARIANTS to the environment when the flag is absent', () => {
      expect(toEnvOverrides({}).VERIFY_INVARIANTS).toBeUndefined()
    })

    it('should report every malformed flag', () => {
      expect(
        validateRunOptions({
          blocks: 'x',
          duration: '0',
          coalescePolicy: 'best-fit',
          logLevel: 'loud',
        }),
      ).toEqual([
        "--blocks must be a positive integer, got 'x'",
        "--duration must be a positive integer, got '0'",
        "--coalesce-policy must be 'reservoir' or 'adjacent', got 'best-fit'",
        "--log-level 'loud' is not a known level",
      ])
      expect(validateRunOptions({ blocks: '3', tickMs: '10' })).toEqual([])
    })
  })

  describe('executeRunCommand', () => {
    beforeEach(() => {
      vi.spyOn(logger, 'init').mockImplementation(() => {})
      vi.spyOn(logger, 'info').mockImplementation(() => {})
      vi.spyOn(logger, 'debug').mockImplementation(() => {})
      vi.spyOn(logger, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
      vi.useRealTimers()
      vi.restoreAllMocks()
    })

    it('should exit 1 on a malformed flag', async () => {
      await expect(executeRunCommand({ blocks: 'x' })).resolves.toBe(1)
    })

    it('should exit 1 when the configuration is inconsistent', async () => {
      await expect(
        executeRunCommand({ minRequest: '60', maxRequest: '50' }),
      ).resolves.toBe(1)
      expect(logger.error).toHaveBeenCalledWith(
        'Invalid configuration',
        expect.objectContaining({ name: 'ConfigError' }),
        {
          issues: [
            'MIN_REQUEST_SIZE: MIN_REQUEST_SIZE must not exceed MAX_REQUEST_SIZE',
          ],
        },
      )
    })

    it('should exit 0 after a clean timed run', async () => {
      vi.useFakeTimers()
      const stdout = vi
        .spyOn(process.stdout, 'write')
        .mockImplementation(() => true)
      const sigintListeners = process.listenerCount('SIGINT')

      const running = executeRunCommand({
        blocks: '2',
        blockSize: '100',
        tickMs: '10',
        duration: '100',
      })
      for (let i = 0; i < 5; i++) {
        await vi.advanceTimersByTimeAsync(50)
      }

      await expect(running).resolves.toBe(0)
      expect(stdout).toHaveBeenCalled()
      expect(process.listenerCount('SIGINT')).toBe(sigintListeners)
    })

    describe('log level from a .env file', () => {
      let envDir: string
      let savedLevel: string | undefined

      beforeEach(() => {
        envDir = mkdtempSync(join(tmpdir(), 'blockmem-env-'))
        writeFileSync(join(envDir, '.env'), 'LOG_LEVEL=warn\n')
        // dotenv never overrides a variable that is already set
        savedLevel = process.env['LOG_LEVEL']
        delete process.env['LOG_LEVEL']
      })

      afterEach(() => {
        if (savedLevel === undefined) {
          delete process.env['LOG_LEVEL']
        } else {
          process.env['LOG_LEVEL'] = savedLevel
        }
        rmSync(envDir, { recursive: true, force: true })
      })

      const runBriefly = async (options: { logLevel?: string }) => {
        vi.useFakeTimers()
        vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
        const running = executeRunCommand({
          blocks: '2',
          blockSize: '100',
          tickMs: '10',
          duration: '20',
          env: join(envDir, '.env'),
          ...options,
        })
        for (let i = 0; i < 5; i++) {
          await vi.advanceTimersByTimeAsync(10)
        }
        return running
      }

      it('should initialise the logger with the level from .env', async () => {
        await expect(runBriefly({})).resolves.toBe(0)

        expect(logger.init).toHaveBeenCalledWith('warn')
      })

      it('should let --log-level win over .env', async () => {
        await expect(runBriefly({ logLevel: 'debug' })).resolves.toBe(0)

        expect(logger.init).toHaveBeenCalledWith('debug')
        expect(logger.init).not.toHaveBeenCalledWith('warn')
      })
    })
  })
})
