import { describe, it, expect } from 'vitest'
import {
  describeError,
  DuplicateIdError,
  FleetError,
  InvalidInputError,
  NotFoundError,
  PersistenceError,
  SchemaError,
} from './fleetErrors'

describe('fleet error taxonomy', () => {
  it('tags each error with a stable code', () => {
    expect(new InvalidInputError('bad').code).toBe('invalid_input')
    expect(new NotFoundError('B1').code).toBe('not_found')
    expect(new DuplicateIdError('B1').code).toBe('duplicate_id')
    expect(new PersistenceError('f.json', 'io').code).toBe('persistence_error')
    expect(new SchemaError('f.json', ['boats: Required']).code).toBe('schema_error')
  })

  it('makes SchemaError a kind of PersistenceError', () => {
    const error = new SchemaError('f.json', ['boats: Required'])
    expect(error).toBeInstanceOf(PersistenceError)
    expect(error).toBeInstanceOf(FleetError)
    expect(error.path).toBe('f.json')
    expect(error.name).toBe('SchemaError')
  })

  it('keeps the underlying cause of persistence failures', () => {
    const cause = new Error('EACCES')
    expect(new PersistenceError('f.json', 'denied', { cause }).cause).toBe(cause)
  })
})

describe('describeError', () => {
  it('renders registry errors by message', () => {
    expect(describeError(new NotFoundError('B7'))).toBe('Boat not found: B7')
    expect(describeError(new DuplicateIdError('B1'))).toBe('A boat with id B1 already exists')
  })

  it('lists schema issues', () => {
    expect(describeError(new SchemaError('f.json', ['boats.0.id: Required', 'version: too new']))).toBe(
      'Saved fleet data is invalid: boats.0.id: Required; version: too new',
    )
  })

  it('falls back for foreign errors and values', () => {
    expect(describeError(new RangeError('boom'))).toBe('Unexpected error: boom')
    expect(describeError('oops')).toBe('Unexpected error: oops')
  })
})
