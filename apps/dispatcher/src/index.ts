import { runCli } from './cli/index.js'
import { logger } from './helpers/loggers.js'

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    logger.error(`Unexpected error: ${error instanceof Error ? error.stack : error}`)
    process.exitCode = 1
  })
