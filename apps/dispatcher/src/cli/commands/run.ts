import { Command, InvalidArgumentError } from 'commander'
import { loadCampaign, resolveCampaignFile } from '@jec-dispatch/campaign-utils'
import { config, parseTimeoutMs } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { runCampaign } from '../../services/pipelines/run-campaign.js'
import { CliContext } from '../context.js'

interface RunCommandOptions {
  campaignDir?: string
  sampleDir?: string
  sampleName?: string
  exitOnError?: boolean
  dryRun?: boolean
  skipEnvironment?: boolean
  report?: string
  timeout?: number
}

export const parseTimeout = (value: string): number => {
  const ms = parseTimeoutMs(value)
  if (ms === undefined) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.')
  }
  return ms
}

export function registerRunCommand(program: Command, ctx: CliContext): void {
  program
    .command('run')
    .description(
      'Dispatch every invocation of a campaign; arguments after -- go to each tool call'
    )
    .argument('<campaign>', 'campaign name or path to a campaign YAML file')
    .argument('[passThrough...]', 'arguments forwarded verbatim to the tool')
    .option('--campaign-dir <dir>', 'directory holding campaign files')
    .option('--sample-dir <dir>', 'sample directory (overrides SAMPLE_DIR)')
    .option('--sample-name <name>', 'sample name (overrides SAMPLE_NAME)')
    .option('--exit-on-error', 'stop at the first failing invocation')
    .option('--dry-run', 'print the command lines instead of running them')
    .option('--skip-environment', 'do not source the analysis runtime setup script')
    .option('--report <file>', 'write a YAML run report')
    .option('--timeout <ms>', 'kill an invocation after this many milliseconds', parseTimeout)
    .action(
      async (
        campaignArg: string,
        passThrough: string[] | undefined,
        options: RunCommandOptions
      ) => {
        const campaignFile = await resolveCampaignFile(
          campaignArg,
          options.campaignDir ?? config.campaignDir
        )
        const campaign = await loadCampaign(campaignFile, logger)
        const summary = await runCampaign(campaign, {
          passThrough: passThrough ?? [],
          sampleDir: options.sampleDir,
          sampleName: options.sampleName,
          failurePolicy: options.exitOnError ? 'halt' : 'continue',
          dryRun: options.dryRun,
          skipEnvironment: options.skipEnvironment,
          timeoutMs: options.timeout,
          reportFile: options.report,
          print: ctx.io.out
        })
        ctx.exitCode = summary.exitCode
      }
    )
}
