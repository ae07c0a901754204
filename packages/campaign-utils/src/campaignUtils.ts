import fs from 'fs-extra'
import path from 'path'
import { parse as parseYaml } from 'yaml'
import {
  array,
  boolean,
  InferType,
  mixed,
  number,
  object,
  string,
  ValidationError
} from 'yup'
import {
  CHANNELS,
  CORRECTION_LEVELS,
  DEFAULT_SUFFIX_TEMPLATE,
  INPUT_TYPES,
  Campaign,
  Channel,
  CorrectionLevel,
  InputType,
  InputTypeFlag
} from '@jec-dispatch/types'
import { CampaignError, getErrorMessage } from './errors.js'
import { TEMPLATE_KEYS, templatePlaceholders } from './templateUtils.js'

// Define a minimal logger interface that the dispatcher's winston logger satisfies
export interface Logger {
  info: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug?: (message: string, ...args: unknown[]) => void
  warn?: (message: string, ...args: unknown[]) => void
}

const defaultLogger: Logger = {
  info: () => {},
  error: () => {},
  debug: () => {},
  warn: () => {}
}

const CAMPAIGN_EXTENSIONS = ['.yaml', '.yml']

// Misspelled keys would otherwise be dropped and silently change the matrix
const UNKNOWN_KEYS_MESSAGE = '${path} has unknown key(s): ${unknown}'

const correctionLevelSchema = mixed<CorrectionLevel>()
  .oneOf([...CORRECTION_LEVELS])
  .required()

const inputSchema = object({
  type: mixed<InputType>().oneOf([...INPUT_TYPES]).required(),
  fileTemplate: string().required(),
  correctionLevels: array(correctionLevelSchema).default([]),
  disabledCorrectionLevels: array(correctionLevelSchema).default([]),
  tasks: array(string().required()).min(1).required()
}).noUnknown(UNKNOWN_KEYS_MESSAGE)

export const campaignSchema = object({
  name: string()
    .matches(/^[A-Za-z0-9_.-]+$/, 'name may only contain letters, digits, ".", "_" and "-"')
    .required(),
  description: string().default(''),
  tool: string().required(),
  analysis: string(),
  inputTypeFlag: mixed<InputTypeFlag>()
    .oneOf(['--input-type', '--type'])
    .default('--input-type'),
  environment: object({
    setupScript: string(),
    skip: boolean().default(false)
  }).noUnknown(UNKNOWN_KEYS_MESSAGE),
  sample: object({
    name: string().required(),
    dir: string()
  })
    .noUnknown(UNKNOWN_KEYS_MESSAGE)
    .required(),
  channels: array(mixed<Channel>().oneOf([...CHANNELS]).required()).default([]),
  jobs: number().integer().min(1).required(),
  log: boolean().default(true),
  progress: boolean().default(true),
  dumpYaml: boolean().default(false),
  selection: array(string().required()).default([]),
  treeTemplate: string(),
  suffixTemplate: string().default(DEFAULT_SUFFIX_TEMPLATE),
  inputs: array(inputSchema.required()).min(1).required()
}).noUnknown(UNKNOWN_KEYS_MESSAGE)

type CampaignDocument = InferType<typeof campaignSchema>

async function validateDocument(raw: object): Promise<CampaignDocument> {
  try {
    return await campaignSchema.validate(raw, { abortEarly: false })
  } catch (validationErr) {
    if (validationErr instanceof ValidationError) {
      throw new CampaignError('Campaign validation failed', validationErr.errors)
    }
    throw validationErr
  }
}

const duplicates = <T>(values: readonly T[]): T[] =>
  values.filter((value, i) => values.indexOf(value) !== i)

/**
 * Checks that cannot be expressed field by field: input types and the
 * correction levels of an input are unique, a correction level is never both
 * enabled and disabled, and every template only uses known placeholders.
 */
function checkCampaignConsistency(campaign: Campaign): string[] {
  const problems: string[] = []

  const seen = new Set<InputType>()
  for (const input of campaign.inputs) {
    if (seen.has(input.type)) {
      problems.push(`inputs: input type "${input.type}" is listed more than once`)
    }
    seen.add(input.type)

    for (const level of new Set(duplicates(input.correctionLevels))) {
      problems.push(
        `inputs[${input.type}]: correction level ${level} is listed more than once`
      )
    }

    const clash = input.correctionLevels.filter((level) =>
      input.disabledCorrectionLevels.includes(level)
    )
    if (clash.length > 0) {
      problems.push(
        `inputs[${input.type}]: ${clash.join(', ')} both enabled and disabled`
      )
    }
  }

  const templates: Array<[string, string | undefined]> = [
    ['suffixTemplate', campaign.suffixTemplate],
    ['treeTemplate', campaign.treeTemplate],
    ...campaign.inputs.map(
      (input): [string, string] => [`inputs[${input.type}].fileTemplate`, input.fileTemplate]
    )
  ]
  for (const [field, template] of templates) {
    if (template === undefined) continue
    for (const key of templatePlaceholders(template)) {
      if (!(TEMPLATE_KEYS as readonly string[]).includes(key)) {
        problems.push(`${field}: unknown placeholder {${key}}`)
      }
    }
  }

  return problems
}

/**
 * Parses and validates campaign YAML content.
 */
export async function parseCampaign(yamlContent: string): Promise<Campaign> {
  let raw: unknown
  try {
    raw = parseYaml(yamlContent)
  } catch (error) {
    throw new CampaignError(`Invalid YAML: ${getErrorMessage(error)}`)
  }
  if (!raw || typeof raw !== 'object') {
    throw new CampaignError('Invalid campaign format')
  }

  const validated = await validateDocument(raw)

  const campaign: Campaign = {
    name: validated.name,
    description: validated.description,
    tool: validated.tool,
    analysis: validated.analysis,
    inputTypeFlag: validated.inputTypeFlag,
    environment: {
      setupScript: validated.environment?.setupScript,
      skip: validated.environment?.skip ?? false
    },
    sample: { name: validated.sample.name, dir: validated.sample.dir },
    channels: validated.channels,
    jobs: validated.jobs,
    log: validated.log,
    progress: validated.progress,
    dumpYaml: validated.dumpYaml,
    selection: validated.selection,
    treeTemplate: validated.treeTemplate,
    suffixTemplate: validated.suffixTemplate,
    inputs: validated.inputs.map((input) => ({
      type: input.type,
      fileTemplate: input.fileTemplate,
      correctionLevels: input.correctionLevels,
      disabledCorrectionLevels: input.disabledCorrectionLevels,
      tasks: input.tasks
    }))
  }

  const problems = checkCampaignConsistency(campaign)
  if (problems.length > 0) {
    throw new CampaignError('Campaign validation failed', problems)
  }
  return campaign
}

/**
 * Reads a campaign file from disk and validates it.
 */
export async function loadCampaign(
  campaignFilePath: string,
  logger: Logger = defaultLogger
): Promise<Campaign> {
  let content: string
  try {
    content = await fs.readFile(campaignFilePath, 'utf8')
  } catch (error) {
    throw new CampaignError(
      `Cannot read campaign file ${campaignFilePath}: ${getErrorMessage(error)}`
    )
  }

  try {
    const campaign = await parseCampaign(content)
    logger.debug?.(`Loaded campaign ${campaign.name} from ${campaignFilePath}`)
    return campaign
  } catch (error) {
    if (error instanceof CampaignError) {
      logger.error(`Invalid campaign file ${campaignFilePath}: ${error.message}`)
      throw new CampaignError(
        `${campaignFilePath}: ${error.message}`,
        error.errors
      )
    }
    throw error
  }
}

/**
 * Resolves a campaign argument to a file. An existing path wins, otherwise
 * `<campaignDir>/<name>.yaml` and `.yml` are tried in turn.
 */
export async function resolveCampaignFile(
  nameOrPath: string,
  campaignDir: string
): Promise<string> {
  if (await fs.pathExists(nameOrPath)) {
    const stat = await fs.stat(nameOrPath)
    if (stat.isFile()) return path.resolve(nameOrPath)
  }
  for (const ext of CAMPAIGN_EXTENSIONS) {
    const candidate = path.join(campaignDir, `${nameOrPath}${ext}`)
    if (await fs.pathExists(candidate)) return candidate
  }
  throw new CampaignError(
    `Campaign "${nameOrPath}" not found (looked in ${campaignDir})`
  )
}

export interface CampaignListing {
  file: string
  name: string
  description: string
}

/**
 * Lists the valid campaigns in a directory, sorted by file name. Invalid
 * files are reported through the logger and skipped.
 */
export async function listCampaigns(
  campaignDir: string,
  logger: Logger = defaultLogger
): Promise<CampaignListing[]> {
  if (!(await fs.pathExists(campaignDir))) {
    throw new CampaignError(`Campaign directory ${campaignDir} does not exist`)
  }
  const entries = (await fs.readdir(campaignDir))
    .filter((entry) => CAMPAIGN_EXTENSIONS.includes(path.extname(entry)))
    .sort()

  const listings: CampaignListing[] = []
  for (const entry of entries) {
    const file = path.join(campaignDir, entry)
    try {
      const campaign = await loadCampaign(file, logger)
      listings.push({ file, name: campaign.name, description: campaign.description })
    } catch (error) {
      if (!(error instanceof CampaignError)) throw error
      logger.warn?.(`Skipping ${file}: ${error.message}`)
    }
  }
  return listings
}
