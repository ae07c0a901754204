import { InvocationParams } from './invocation.js'

// `continue` mirrors a plain shell script, `halt` one run with `set -e`
export type FailurePolicy = 'continue' | 'halt'

export interface InvocationResult {
  invocation: InvocationParams
  argv: string[]
  code: number | null
  signal: NodeJS.Signals | null
  exitCode: number
  startedAt: Date
  completedAt: Date
  durationMs: number
}

export interface RunSummary {
  runId: string
  campaign: string
  startedAt: Date
  completedAt: Date
  dryRun: boolean
  failurePolicy: FailurePolicy
  // The full matrix; `results` stops short of it after a halt or in a dry run
  invocations: InvocationParams[]
  results: InvocationResult[]
  exitCode: number
}
