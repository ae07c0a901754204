import { Channel, CorrectionLevel, InputType } from './channels.js'

export type InputTypeFlag = '--input-type' | '--type'

/**
 * Everything needed to build one command line of an external tool.
 * `channel` and `correctionLevel` are absent for campaigns that do not
 * loop over them.
 */
export interface InvocationParams {
  index: number
  tool: string
  analysis?: string
  channel?: Channel
  correctionLevel?: CorrectionLevel
  inputType: InputType
  inputTypeFlag: InputTypeFlag
  inputFile: string
  tree?: string
  jobs: number
  log: boolean
  progress: boolean
  dumpYaml: boolean
  selection: string[]
  passThrough: string[]
  tasks: string[]
  outputFileSuffix: string
}
