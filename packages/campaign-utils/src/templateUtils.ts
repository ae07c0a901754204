import { CampaignError } from './errors.js'

export const TEMPLATE_KEYS = [
  'channel',
  'sample',
  'sampleDir',
  'correctionLevel',
  'inputType'
] as const

export type TemplateKey = (typeof TEMPLATE_KEYS)[number]

export type TemplateValues = Partial<Record<TemplateKey, string>>

const PLACEHOLDER = /\{([A-Za-z]+)\}/g

const isTemplateKey = (key: string): key is TemplateKey =>
  (TEMPLATE_KEYS as readonly string[]).includes(key)

/**
 * Substitutes `{key}` placeholders. Throws on a placeholder that is not a
 * known key, or whose value is missing for this invocation.
 */
export function renderTemplate(
  template: string,
  values: TemplateValues
): string {
  return template.replace(PLACEHOLDER, (match: string, key: string) => {
    if (!isTemplateKey(key)) {
      throw new CampaignError(
        `Unknown placeholder ${match} in template "${template}"`
      )
    }
    const value = values[key]
    if (value === undefined) {
      throw new CampaignError(
        `No value for placeholder ${match} in template "${template}"`
      )
    }
    return value
  })
}

export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (m) => m[1])
}
