import fs from 'fs-extra'
import { stringify as stringifyYaml } from 'yaml'
import { buildArgv, formatCommandLine } from '@jec-dispatch/campaign-utils'
import { RunSummary } from '@jec-dispatch/types'
import { logger } from '../../helpers/loggers.js'

interface ReportEntry {
  index: number
  channel: string | null
  inputType: string
  correctionLevel: string | null
  outputFileSuffix: string
  command: string
  status: 'success' | 'failed' | 'not run'
  exitCode: number | null
  signal: string | null
  durationMs: number | null
}

export const buildRunReport = (summary: RunSummary) => ({
  runId: summary.runId,
  campaign: summary.campaign,
  startedAt: summary.startedAt.toISOString(),
  completedAt: summary.completedAt.toISOString(),
  dryRun: summary.dryRun,
  failurePolicy: summary.failurePolicy,
  exitCode: summary.exitCode,
  invocations: summary.invocations.map((invocation): ReportEntry => {
    const result = summary.results.find(
      (r) => r.invocation.index === invocation.index
    )
    return {
      index: invocation.index,
      channel: invocation.channel ?? null,
      inputType: invocation.inputType,
      correctionLevel: invocation.correctionLevel ?? null,
      outputFileSuffix: invocation.outputFileSuffix,
      command: formatCommandLine(invocation.tool, buildArgv(invocation)),
      status: !result ? 'not run' : result.exitCode === 0 ? 'success' : 'failed',
      exitCode: result?.exitCode ?? null,
      signal: result?.signal ?? null,
      durationMs: result?.durationMs ?? null
    }
  })
})

export const writeRunReport = async (
  summary: RunSummary,
  reportFile: string
): Promise<void> => {
  const yamlContent = stringifyYaml(buildRunReport(summary), {
    indent: 2,
    lineWidth: 0 // No line wrapping
  })
  await fs.outputFile(reportFile, yamlContent)
  logger.info(`Run report written to ${reportFile}`)
}
