export {
  campaignSchema,
  parseCampaign,
  loadCampaign,
  resolveCampaignFile,
  listCampaigns
} from './campaignUtils.js'
export type { CampaignListing, Logger } from './campaignUtils.js'
export { buildInvocations, buildOutputSuffix } from './matrixUtils.js'
export type { MatrixOptions } from './matrixUtils.js'
export { buildArgv, formatCommandLine, quoteArg } from './argvUtils.js'
export { renderTemplate, TEMPLATE_KEYS } from './templateUtils.js'
export type { TemplateKey, TemplateValues } from './templateUtils.js'
export { CampaignError, getErrorMessage } from './errors.js'
