import { Command } from 'commander'
import {
  buildInvocations,
  loadCampaign,
  resolveCampaignFile
} from '@jec-dispatch/campaign-utils'
import { InvocationParams } from '@jec-dispatch/types'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { CliContext } from '../context.js'

const HEADER = ['#', 'channel', 'input', 'level', 'suffix']

export function formatInvocationTable(invocations: InvocationParams[]): string[] {
  const rows = [
    HEADER,
    ...invocations.map((inv) => [
      String(inv.index),
      inv.channel ?? '-',
      inv.inputType,
      inv.correctionLevel ?? '-',
      inv.outputFileSuffix
    ])
  ]
  const widths = HEADER.map((_, col) =>
    Math.max(...rows.map((row) => row[col].length))
  )
  return rows.map((row) =>
    row
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd()
  )
}

export function registerShowCommand(program: Command, ctx: CliContext): void {
  program
    .command('show')
    .description('Show the invocation matrix of a campaign without running it')
    .argument('<campaign>', 'campaign name or path to a campaign YAML file')
    .argument('[passThrough...]', 'arguments forwarded verbatim to the tool')
    .option('--campaign-dir <dir>', 'directory holding campaign files')
    .option('--sample-dir <dir>', 'sample directory (overrides SAMPLE_DIR)')
    .option('--sample-name <name>', 'sample name (overrides SAMPLE_NAME)')
    .action(
      async (
        campaignArg: string,
        passThrough: string[] | undefined,
        options: { campaignDir?: string; sampleDir?: string; sampleName?: string }
      ) => {
        const campaignFile = await resolveCampaignFile(
          campaignArg,
          options.campaignDir ?? config.campaignDir
        )
        const campaign = await loadCampaign(campaignFile, logger)
        const invocations = buildInvocations(campaign, {
          passThrough: passThrough ?? [],
          sampleDir: options.sampleDir ?? config.sampleDir,
          sampleName: options.sampleName ?? config.sampleName
        })
        for (const line of formatInvocationTable(invocations)) {
          ctx.io.out(line)
        }
        ctx.io.out(`${invocations.length} invocation(s) of ${campaign.tool}`)
      }
    )
}
