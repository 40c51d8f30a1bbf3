export class FusionError extends Error {
  readonly field?: string
  readonly value?: unknown

  constructor(message: string, field?: string, value?: unknown) {
    super(message)
    this.name = 'FusionError'
    this.field = field
    this.value = value
  }
}

/** Rejected input: the whole call fails and nothing partial is returned. */
export class InvalidInputError extends FusionError {
  constructor(message: string, field?: string, value?: unknown) {
    super(message, field, value)
    this.name = 'InvalidInputError'
  }
}

/** Bad weights or presets, raised when the config is built rather than when it is used. */
export class ConfigurationError extends FusionError {
  constructor(message: string, field?: string, value?: unknown) {
    super(message, field, value)
    this.name = 'ConfigurationError'
  }
}

/**
 * Total contradiction (K = 1) between two mass functions. Callers can recover by
 * rerunning with the Dempster-Shafer weight set to zero (see `withoutStrategy`).
 */
export class FusionConflictError extends FusionError {
  readonly conflict: number
  readonly operands: [string, string]

  constructor(conflict: number, operands: [string, string]) {
    super(`Total conflict between evidence '${operands[0]}' and '${operands[1]}' (K=${conflict})`, 'conflict', conflict)
    this.name = 'FusionConflictError'
    this.conflict = conflict
    this.operands = operands
  }
}
