import {
  Campaign,
  CampaignInput,
  Channel,
  CorrectionLevel,
  DEFAULT_SUFFIX_TEMPLATE,
  InvocationParams
} from '@jec-dispatch/types'
import { renderTemplate, TemplateValues } from './templateUtils.js'

export interface MatrixOptions {
  // Forwarded verbatim, in order, to every invocation
  passThrough?: string[]
  // Override the campaign's sample section (SAMPLE_NAME / SAMPLE_DIR)
  sampleName?: string
  sampleDir?: string
}

/**
 * `Z<channel>_<sampleName>_<correctionLevel>`, the suffix the Z+jet
 * campaigns give every output file.
 */
export function buildOutputSuffix(
  channel: Channel,
  sampleName: string,
  correctionLevel: CorrectionLevel
): string {
  return renderTemplate(DEFAULT_SUFFIX_TEMPLATE, {
    channel,
    sample: sampleName,
    correctionLevel
  })
}

// A campaign without channels or correction levels still runs once per input
const loopOver = <T>(values: T[]): Array<T | undefined> =>
  values.length > 0 ? values : [undefined]

const dispatchedLevels = (input: CampaignInput): CorrectionLevel[] =>
  input.correctionLevels.filter(
    (level) => !input.disabledCorrectionLevels.includes(level)
  )

/**
 * Expands a campaign into its ordered invocation matrix:
 * channel → input type (in campaign order) → correction level.
 */
export function buildInvocations(
  campaign: Campaign,
  options: MatrixOptions = {}
): InvocationParams[] {
  const passThrough = options.passThrough ?? []
  const sampleName = options.sampleName ?? campaign.sample.name
  const sampleDir = options.sampleDir ?? campaign.sample.dir

  const invocations: InvocationParams[] = []
  for (const channel of loopOver(campaign.channels)) {
    for (const input of campaign.inputs) {
      for (const correctionLevel of loopOver(dispatchedLevels(input))) {
        const values: TemplateValues = {
          channel,
          sample: sampleName,
          sampleDir,
          correctionLevel,
          inputType: input.type
        }
        invocations.push({
          index: invocations.length + 1,
          tool: campaign.tool,
          analysis: campaign.analysis,
          channel,
          correctionLevel,
          inputType: input.type,
          inputTypeFlag: campaign.inputTypeFlag,
          inputFile: renderTemplate(input.fileTemplate, values),
          tree:
            campaign.treeTemplate === undefined
              ? undefined
              : renderTemplate(campaign.treeTemplate, values),
          jobs: campaign.jobs,
          log: campaign.log,
          progress: campaign.progress,
          dumpYaml: campaign.dumpYaml,
          selection: [...campaign.selection],
          passThrough: [...passThrough],
          tasks: [...input.tasks],
          outputFileSuffix: renderTemplate(campaign.suffixTemplate, values)
        })
      }
    }
  }
  return invocations
}
