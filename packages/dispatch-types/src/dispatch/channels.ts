export const CHANNELS = ['mm', 'ee'] as const

export type Channel = (typeof CHANNELS)[number]

export const INPUT_TYPES = ['mc', 'data'] as const

export type InputType = (typeof INPUT_TYPES)[number]

// Jet energy correction stages applied to an ntuple
export const CORRECTION_LEVELS = ['L1L2L3', 'L1L2Res', 'L1L2L3Res'] as const

export type CorrectionLevel = (typeof CORRECTION_LEVELS)[number]

export const isChannel = (value: unknown): value is Channel =>
  typeof value === 'string' && (CHANNELS as readonly string[]).includes(value)

export const isInputType = (value: unknown): value is InputType =>
  typeof value === 'string' && (INPUT_TYPES as readonly string[]).includes(value)

export const isCorrectionLevel = (value: unknown): value is CorrectionLevel =>
  typeof value === 'string' &&
  (CORRECTION_LEVELS as readonly string[]).includes(value)
