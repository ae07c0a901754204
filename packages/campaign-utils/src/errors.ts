/**
 * Raised for campaign files that cannot be read, fail validation, or use a
 * template placeholder that has no value.
 */
export class CampaignError extends Error {
  readonly errors: string[]

  constructor(message: string, errors: string[] = []) {
    super(message)
    this.name = 'CampaignError'
    this.errors = errors
  }
}

export const getErrorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : typeof e === 'string' ? e : JSON.stringify(e)
