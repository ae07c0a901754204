import { Command } from 'commander'
import { listCampaigns } from '@jec-dispatch/campaign-utils'
import { config } from '../../config/config.js'
import { logger } from '../../helpers/loggers.js'
import { CliContext } from '../context.js'

export function registerListCommand(program: Command, ctx: CliContext): void {
  program
    .command('list')
    .alias('ls')
    .description('List the available campaigns')
    .option('--campaign-dir <dir>', 'directory holding campaign files')
    .action(async (options: { campaignDir?: string }) => {
      const listings = await listCampaigns(
        options.campaignDir ?? config.campaignDir,
        logger
      )
      const width = Math.max(0, ...listings.map((l) => l.name.length))
      for (const listing of listings) {
        ctx.io.out(`${listing.name.padEnd(width)}  ${listing.description}`.trimEnd())
      }
    })
}
