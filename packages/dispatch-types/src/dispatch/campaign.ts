import { Channel, CorrectionLevel, InputType } from './channels.js'
import { InputTypeFlag } from './invocation.js'

export interface CampaignSample {
  name: string
  dir?: string
}

export interface CampaignEnvironment {
  // Path to a setup script, or a command name resolved through PATH
  setupScript?: string
  skip: boolean
}

export interface CampaignInput {
  type: InputType
  fileTemplate: string
  correctionLevels: CorrectionLevel[]
  disabledCorrectionLevels: CorrectionLevel[]
  tasks: string[]
}

export interface Campaign {
  name: string
  description: string
  tool: string
  analysis?: string
  inputTypeFlag: InputTypeFlag
  environment: CampaignEnvironment
  sample: CampaignSample
  channels: Channel[]
  jobs: number
  log: boolean
  progress: boolean
  dumpYaml: boolean
  selection: string[]
  treeTemplate?: string
  suffixTemplate: string
  inputs: CampaignInput[]
}

export const DEFAULT_SUFFIX_TEMPLATE = 'Z{channel}_{sample}_{correctionLevel}'
