import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'
import { CampaignEnvironment } from '@jec-dispatch/types'
import { logger } from './loggers.js'

export class RuntimeEnvironmentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RuntimeEnvironmentError'
  }
}

const SETUP_NOT_FOUND = 127

// $1 is a setup script path or a command on PATH (`source $(which with_root_df)`).
// Everything the setup script prints goes to stderr so stdout is only `env -0`.
export const CAPTURE_ENV_SCRIPT = [
  'target="$1"',
  'shift',
  'case "$target" in',
  '  */*) ;;',
  `  *) target="$(command -v "$target")" || exit ${SETUP_NOT_FOUND} ;;`,
  'esac',
  `[ -f "$target" ] || exit ${SETUP_NOT_FOUND}`,
  'source "$target" 1>&2 || exit $?',
  'env -0'
].join('\n')

// Set by bash itself, not by the setup script
const SHELL_VARIABLES = new Set(['_', 'SHLVL', 'OLDPWD'])

export function parseEnvDump(dump: string): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {}
  for (const entry of dump.split('\0')) {
    const eq = entry.indexOf('=')
    if (eq <= 0) continue
    const key = entry.slice(0, eq)
    if (SHELL_VARIABLES.has(key)) continue
    env[key] = entry.slice(eq + 1)
  }
  return env
}

export interface RuntimeEnvironmentOptions {
  skip?: boolean
  baseEnv?: NodeJS.ProcessEnv
}

/**
 * Sources the analysis runtime setup script in bash and returns the
 * resulting environment for the tool invocations. Without a setup script,
 * or when skipped, the base environment is used as is.
 */
export async function loadRuntimeEnvironment(
  environment: CampaignEnvironment,
  opts: RuntimeEnvironmentOptions = {}
): Promise<NodeJS.ProcessEnv> {
  const baseEnv = opts.baseEnv ?? process.env
  const setupScript = environment.setupScript

  if (opts.skip || environment.skip || !setupScript) {
    logger.info('Using the current environment as the analysis runtime')
    return { ...baseEnv }
  }

  logger.info(`Sourcing analysis runtime environment [${setupScript}]...`)

  const child = spawn(
    'bash',
    ['-c', CAPTURE_ENV_SCRIPT, 'jec-dispatch-env', setupScript],
    { env: { ...baseEnv }, stdio: ['ignore', 'pipe', 'pipe'] }
  )

  const errorP = once(child, 'error').then(([err]) => {
    throw new RuntimeEnvironmentError(
      `Cannot start bash to source ${setupScript}: ${err}`
    )
  })

  const chunks: Buffer[] = []
  child.stdout?.on('data', (chunk: Buffer | string) => {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  })
  let rlErr: readline.Interface | undefined
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr })
    rlErr.on('line', (line) => logger.debug(`[setup] ${line}`))
  }

  const closeP = once(child, 'close').then(
    ([code]): number | null => code
  )

  let code: number | null
  try {
    code = await Promise.race([closeP, errorP])
  } finally {
    rlErr?.close()
  }

  if (code === SETUP_NOT_FOUND) {
    throw new RuntimeEnvironmentError(
      `Analysis runtime setup script not found: ${setupScript}`
    )
  }
  if (code !== 0) {
    throw new RuntimeEnvironmentError(
      `Sourcing ${setupScript} failed with exit code ${code}`
    )
  }

  const env = parseEnvDump(Buffer.concat(chunks).toString('utf8'))
  logger.info(
    `Analysis runtime environment ready (${Object.keys(env).length} variables)`
  )
  return env
}
