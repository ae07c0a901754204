import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { buildArgv, formatCommandLine } from '@jec-dispatch/campaign-utils'
import { InvocationParams, InvocationResult } from '@jec-dispatch/types'
import { logger } from '../../helpers/loggers.js'
import { runTool, RunToolResult } from '../../helpers/runTool.js'

export interface InvocationContext {
  runId: string
  env: NodeJS.ProcessEnv
  logDir: string
  timeoutMs?: number
}

// Exit statuses a shell reports when it cannot run a command
const SPAWN_ERROR_EXIT_CODES: Record<string, number> = {
  ENOENT: 127,
  EACCES: 126
}

/**
 * Shell-style exit status: the exit code, or 128 + signal number for a
 * tool that was killed.
 */
export const exitCodeFor = ({ code, signal }: RunToolResult): number => {
  if (code !== null) return code
  if (signal !== null) return 128 + (os.constants.signals[signal] ?? 0)
  return 1
}

const spawnErrorExitCode = (error: unknown): number | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return SPAWN_ERROR_EXIT_CODES[error.code]
  }
  return undefined
}

export const invocationLogBaseName = (invocation: InvocationParams): string =>
  [
    String(invocation.index).padStart(2, '0'),
    invocation.inputType,
    invocation.outputFileSuffix.replace(/[^A-Za-z0-9_.-]/g, '_')
  ].join('_')

const closeStream = (stream: fs.WriteStream): Promise<void> =>
  new Promise((resolve, reject) => {
    stream.on('error', reject)
    stream.end(() => resolve())
  })

/**
 * Runs one invocation of the matrix. Tool output goes to
 * `<logDir>/<runId>/<NN>_<inputType>_<suffix>.log` (and `_error.log`) and,
 * at debug level, to the logger.
 */
export const runInvocation = async (
  invocation: InvocationParams,
  ctx: InvocationContext
): Promise<InvocationResult> => {
  const argv = buildArgv(invocation)
  const runLogDir = path.join(ctx.logDir, ctx.runId)
  await fs.ensureDir(runLogDir)
  const baseName = invocationLogBaseName(invocation)
  const logStream = fs.createWriteStream(path.join(runLogDir, `${baseName}.log`))
  const errorStream = fs.createWriteStream(
    path.join(runLogDir, `${baseName}_error.log`)
  )

  logger.info(
    `[${invocation.index}] ${formatCommandLine(invocation.tool, argv)}`
  )

  const startedAt = new Date()
  let exitCode: number
  let toolResult: RunToolResult = { code: null, signal: null }
  try {
    toolResult = await runTool(invocation.tool, argv, {
      env: ctx.env,
      timeoutMs: ctx.timeoutMs,
      onStdoutLine: (line) => {
        logStream.write(`${line}\n`)
        logger.debug(`[${invocation.index}] ${line}`)
      },
      onStderrLine: (line) => {
        errorStream.write(`${line}\n`)
        logger.debug(`[${invocation.index}] stderr: ${line}`)
      }
    })
    exitCode = exitCodeFor(toolResult)
  } catch (error) {
    const code = spawnErrorExitCode(error)
    if (code === undefined) throw error
    logger.error(`[${invocation.index}] Cannot run ${invocation.tool}: ${error}`)
    errorStream.write(`${error}\n`)
    exitCode = code
  } finally {
    await Promise.all([closeStream(logStream), closeStream(errorStream)])
  }
  const completedAt = new Date()

  if (exitCode === 0) {
    logger.info(`[${invocation.index}] ${invocation.tool} finished successfully`)
  } else {
    logger.error(
      `[${invocation.index}] ${invocation.tool} exited with code ${exitCode} (suffix ${invocation.outputFileSuffix})`
    )
  }

  return {
    invocation,
    argv,
    code: toolResult.code,
    signal: toolResult.signal,
    exitCode,
    startedAt,
    completedAt,
    durationMs: completedAt.getTime() - startedAt.getTime()
  }
}
