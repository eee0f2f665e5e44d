import { logger } from '@blockmem/core'
import { Command } from 'commander'
import { createRunCommand } from './commands/run'

const program = new Command('blockmem')
  .description('First-fit block memory simulator with concurrent actors')
  .version('0.1.0')

program.addCommand(createRunCommand())

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error)
  process.exit(1)
})

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', reason)
  process.exit(1)
})

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Fatal error in CLI', error)
  process.exit(1)
})
