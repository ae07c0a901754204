import { InvocationParams } from '@jec-dispatch/types'

/**
 * Argument vector for one tool invocation, without the executable. The
 * order matches the hand-written dispatch scripts the campaigns replace:
 * pass-through arguments go right before the `task` positional.
 */
export function buildArgv(invocation: InvocationParams): string[] {
  const argv: string[] = []
  if (invocation.analysis !== undefined) {
    argv.push('-a', invocation.analysis)
  }
  argv.push('-i', invocation.inputFile)
  if (invocation.selection.length > 0) {
    argv.push('--selection', ...invocation.selection)
  }
  if (invocation.tree !== undefined) {
    argv.push('--tree', invocation.tree)
  }
  argv.push(invocation.inputTypeFlag, invocation.inputType)
  argv.push(`-j${invocation.jobs}`)
  if (invocation.log) argv.push('--log')
  if (invocation.progress) argv.push('--progress')
  if (invocation.dumpYaml) argv.push('--dump-yaml')
  argv.push(...invocation.passThrough)
  argv.push('task', ...invocation.tasks)
  argv.push('--output-file-suffix', invocation.outputFileSuffix)
  return argv
}

const SAFE_ARG = /^[A-Za-z0-9_\-./=:,@%+]+$/

export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

/**
 * Command line as it would be typed into a shell, for dry runs and logs.
 */
export function formatCommandLine(tool: string, argv: string[]): string {
  return [tool, ...argv].map(quoteArg).join(' ')
}
