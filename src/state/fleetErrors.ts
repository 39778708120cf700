export type FleetErrorCode =
  | 'invalid_input'
  | 'not_found'
  | 'duplicate_id'
  | 'persistence_error'
  | 'schema_error'

export class FleetError extends Error {
  constructor(
    public readonly code: FleetErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'FleetError'
  }
}

export class InvalidInputError extends FleetError {
  constructor(message: string) {
    super('invalid_input', message)
    this.name = 'InvalidInputError'
  }
}

export class NotFoundError extends FleetError {
  constructor(public readonly boatId: string) {
    super('not_found', `Boat not found: ${boatId}`)
    this.name = 'NotFoundError'
  }
}

export class DuplicateIdError extends FleetError {
  constructor(public readonly boatId: string) {
    super('duplicate_id', `A boat with id ${boatId} already exists`)
    this.name = 'DuplicateIdError'
  }
}

export class PersistenceError extends FleetError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown; code?: 'persistence_error' | 'schema_error' },
  ) {
    super(options?.code ?? 'persistence_error', message, { cause: options?.cause })
    this.name = 'PersistenceError'
  }
}

export class SchemaError extends PersistenceError {
  constructor(
    path: string,
    public readonly issues: string[],
  ) {
    super(path, `Invalid fleet document ${path}: ${issues.join('; ')}`, { code: 'schema_error' })
    this.name = 'SchemaError'
  }
}

/** One-line, user-facing rendering of anything a registry operation may throw. */
export const describeError = (error: unknown): string => {
  if (error instanceof SchemaError) {
    return `Saved fleet data is invalid: ${error.issues.join('; ')}`
  }
  if (error instanceof FleetError) {
    return error.message
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`
  }
  return `Unexpected error: ${String(error)}`
}
