import { v4 as uuid } from 'uuid'
import {
  buildArgv,
  buildInvocations,
  formatCommandLine
} from '@jec-dispatch/campaign-utils'
import {
  Campaign,
  FailurePolicy,
  InvocationResult,
  RunSummary
} from '@jec-dispatch/types'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { loadRuntimeEnvironment } from '../../helpers/runtimeEnv.js'
import { runInvocation } from '../functions/dispatch-functions.js'
import { writeRunReport } from '../functions/report.js'

export interface RunCampaignOptions {
  passThrough?: string[]
  sampleName?: string
  sampleDir?: string
  failurePolicy?: FailurePolicy
  dryRun?: boolean
  skipEnvironment?: boolean
  timeoutMs?: number
  logDir?: string
  reportFile?: string
  // Receives the command lines of a dry run
  print?: (line: string) => void
}

/**
 * Dispatches every invocation of a campaign, one after the other.
 *
 * With the `continue` policy a failed invocation is logged and the run goes
 * on; the run's exit code is then that of the last invocation, as for a
 * shell script. With `halt` the run stops at the first failure and returns
 * its exit code.
 */
export const runCampaign = async (
  campaign: Campaign,
  opts: RunCampaignOptions = {}
): Promise<RunSummary> => {
  const runId = uuid()
  const failurePolicy = opts.failurePolicy ?? 'continue'
  const dryRun = opts.dryRun ?? false
  const print = opts.print ?? ((line: string) => console.log(line))
  const startedAt = new Date()

  const invocations = buildInvocations(campaign, {
    passThrough: opts.passThrough,
    sampleName: opts.sampleName ?? config.sampleName,
    sampleDir: opts.sampleDir ?? config.sampleDir
  })
  logger.info(
    `Start campaign ${campaign.name} run ${runId}: ${invocations.length} invocation(s) of ${campaign.tool}`
  )

  const results: InvocationResult[] = []
  let exitCode = 0

  if (dryRun) {
    for (const invocation of invocations) {
      print(formatCommandLine(invocation.tool, buildArgv(invocation)))
    }
  } else {
    const env = await loadRuntimeEnvironment(campaign.environment, {
      skip: opts.skipEnvironment
    })
    for (const invocation of invocations) {
      const result = await runInvocation(invocation, {
        runId,
        env,
        logDir: opts.logDir ?? config.logDir,
        timeoutMs: opts.timeoutMs ?? config.timeoutMs
      })
      results.push(result)
      exitCode = result.exitCode
      if (exitCode !== 0 && failurePolicy === 'halt') {
        logger.error(
          `Halting campaign ${campaign.name} after invocation ${invocation.index} of ${invocations.length}`
        )
        break
      }
    }
  }

  const failed = results.filter((r) => r.exitCode !== 0).length
  const summary: RunSummary = {
    runId,
    campaign: campaign.name,
    startedAt,
    completedAt: new Date(),
    dryRun,
    failurePolicy,
    invocations,
    results,
    exitCode
  }
  logger.info(
    `Finish campaign ${campaign.name} run ${runId}: ${results.length} run, ${failed} failed, exit code ${exitCode}`
  )

  if (opts.reportFile) {
    await writeRunReport(summary, opts.reportFile)
  }
  return summary
}
