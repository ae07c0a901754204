export * from './dispatch/channels.js'
export type { InvocationParams, InputTypeFlag } from './dispatch/invocation.js'
export type {
  Campaign,
  CampaignEnvironment,
  CampaignInput,
  CampaignSample
} from './dispatch/campaign.js'
export { DEFAULT_SUFFIX_TEMPLATE } from './dispatch/campaign.js'
export type {
  FailurePolicy,
  InvocationResult,
  RunSummary
} from './dispatch/results.js'
