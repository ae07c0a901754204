import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'

export interface RunToolOptions {
  // Complete environment of the tool; defaults to this process's environment
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
}

export interface RunToolResult {
  code: number | null
  signal: NodeJS.Signals | null
}

const KILL_GRACE_MS = 5000

/**
 * Runs an external analysis tool to completion, streaming its output line
 * by line. Resolves with the exit code and signal, rejects on spawn errors.
 */
export async function runTool(
  command: string,
  args: string[],
  opts: RunToolOptions = {}
): Promise<RunToolResult> {
  const { env, timeoutMs, onStdoutLine, onStderrLine } = opts

  const child = spawn(command, args, {
    env: env ?? process.env,
    stdio: ['ignore', 'pipe', 'pipe']
  })

  // Handle spawn errors (e.g., ENOENT) so we don’t hang forever
  const errorP = once(child, 'error').then(([err]) => {
    throw err
  })

  let rlOut: readline.Interface | undefined
  let rlErr: readline.Interface | undefined
  if (child.stdout) {
    rlOut = readline.createInterface({ input: child.stdout })
    rlOut.on('line', (line) => onStdoutLine?.(line.replace(/\r$/, '')))
  }
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr })
    rlErr.on('line', (line) => onStderrLine?.(line.replace(/\r$/, '')))
  }

  let termTimer: NodeJS.Timeout | undefined
  let killTimer: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0) {
    termTimer = setTimeout(() => {
      child.kill('SIGTERM')
      killTimer = setTimeout(() => {
        child.kill('SIGKILL')
      }, KILL_GRACE_MS)
    }, timeoutMs)
  }

  // Prefer 'close' so all stdio is drained
  const closeP = once(child, 'close').then(
    ([code, signal]): RunToolResult => ({ code, signal })
  )

  try {
    return await Promise.race([closeP, errorP])
  } finally {
    if (termTimer) clearTimeout(termTimer)
    if (killTimer) clearTimeout(killTimer)
    rlOut?.close()
    rlErr?.close()
  }
}
