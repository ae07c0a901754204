import dotenv from 'dotenv'
import path from 'path'
import { fileURLToPath } from 'url'
dotenv.config()

const bundledCampaignDir = fileURLToPath(
  new URL('../../../../campaigns', import.meta.url)
)

// Whole milliseconds only: '10abc', '1.5' and '0' are not timeouts
export const parseTimeoutMs = (value: string): number | undefined => {
  const ms = Number(value)
  return Number.isInteger(ms) && ms > 0 ? ms : undefined
}

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logDir: process.env.JEC_DISPATCH_LOGS ?? path.resolve('logs'),
  timezone: process.env.JEC_DISPATCH_TIMEZONE ?? 'Europe/Berlin',
  campaignDir: process.env.JEC_DISPATCH_CAMPAIGNS ?? bundledCampaignDir,
  // Same variables the sample's common.sh used to export
  sampleDir: process.env.SAMPLE_DIR,
  sampleName: process.env.SAMPLE_NAME,
  timeoutMs: process.env.JEC_DISPATCH_TIMEOUT_MS
    ? parseTimeoutMs(process.env.JEC_DISPATCH_TIMEOUT_MS)
    : undefined
}
