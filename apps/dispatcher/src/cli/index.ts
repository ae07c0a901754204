import { Command, CommanderError } from 'commander'
import fs from 'fs-extra'
import { fileURLToPath } from 'url'
import { CampaignError } from '@jec-dispatch/campaign-utils'
import { logger } from '../helpers/loggers.js'
import { RuntimeEnvironmentError } from '../helpers/runtimeEnv.js'
import { registerListCommand } from './commands/list.js'
import { registerRunCommand } from './commands/run.js'
import { registerShowCommand } from './commands/show.js'
import {
  CliContext,
  CliIO,
  defaultIO,
  EXIT_RUNTIME_ENVIRONMENT,
  EXIT_USAGE
} from './context.js'

function getPackageVersion(): string {
  const pkgFile = fileURLToPath(new URL('../../package.json', import.meta.url))
  const pkg: { version?: string } = fs.readJsonSync(pkgFile)
  return pkg.version ?? '0.0.0'
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command()

  program
    .name('jec-dispatch')
    .description(
      'Dispatch lumberjack.py / pp.py invocations for jet energy correction campaigns'
    )
    .version(getPackageVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.io.out(str.replace(/\n$/, '')),
      writeErr: (str) => ctx.io.err(str.replace(/\n$/, ''))
    })

  registerRunCommand(program, ctx)
  registerListCommand(program, ctx)
  registerShowCommand(program, ctx)

  return program
}

/**
 * Parses `argv` (without the node and script entries), runs the command and
 * returns the process exit code.
 */
export async function runCli(
  argv: string[],
  io: CliIO = defaultIO
): Promise<number> {
  const ctx: CliContext = { io, exitCode: 0 }
  const program = createProgram(ctx)

  try {
    await program.parseAsync(argv, { from: 'user' })
    return ctx.exitCode
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : EXIT_USAGE
    }
    if (error instanceof CampaignError) {
      logger.error(error.message)
      io.err(`error: ${error.message}`)
      for (const problem of error.errors) io.err(`  - ${problem}`)
      return EXIT_USAGE
    }
    if (error instanceof RuntimeEnvironmentError) {
      logger.error(error.message)
      io.err(`error: ${error.message}`)
      return EXIT_RUNTIME_ENVIRONMENT
    }
    throw error
  }
}
