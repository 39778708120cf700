import type {
  ArrivalLogEntry,
  Boat,
  BoatKindDetails,
  FleetActivityEntry,
  NewBoatOptions,
  PositionRecord,
} from '@/types/fleet'
import { InvalidInputError } from './fleetErrors'

export const LATITUDE_RANGE = [-90, 90] as const
export const LONGITUDE_RANGE = [-180, 180] as const

const LAUNCH_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export const isValidLatitude = (value: number) =>
  Number.isFinite(value) && value >= LATITUDE_RANGE[0] && value <= LATITUDE_RANGE[1]

export const isValidLongitude = (value: number) =>
  Number.isFinite(value) && value >= LONGITUDE_RANGE[0] && value <= LONGITUDE_RANGE[1]

/** True for a real calendar day written as YYYY-MM-DD (2023-02-30 is rejected). */
export const isValidLaunchDate = (value: string) => {
  if (!LAUNCH_DATE_PATTERN.test(value)) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value
}

// toISOString switches to a signed six-digit year outside this range, which
// stored documents do not accept.
const MIN_TIMESTAMP_YEAR = 0
const MAX_TIMESTAMP_YEAR = 9999

export const toTimestamp = (date: Date) => {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidInputError('Timestamp is not a valid date')
  }
  const year = date.getUTCFullYear()
  if (year < MIN_TIMESTAMP_YEAR || year > MAX_TIMESTAMP_YEAR) {
    throw new InvalidInputError(
      `Timestamp year must be within ${MIN_TIMESTAMP_YEAR}-${MAX_TIMESTAMP_YEAR}, got ${year}`,
    )
  }
  return date.toISOString()
}

const requireText = (value: string, label: string) => {
  if (!value.trim()) {
    throw new InvalidInputError(`${label} must be a non-empty string`)
  }
  return value
}

export const validateLaunchDate = (value: string | undefined) => {
  if (value === undefined) return undefined
  if (!isValidLaunchDate(value)) {
    throw new InvalidInputError(`Launch date must be a YYYY-MM-DD calendar date, got "${value}"`)
  }
  return value
}

export const validateKindDetails = (details: BoatKindDetails): BoatKindDetails => {
  switch (details.kind) {
    case 'standard':
      return { kind: 'standard' }
    case 'cargo':
      if (!Number.isFinite(details.cargoCapacity) || details.cargoCapacity < 0) {
        throw new InvalidInputError('Cargo capacity must be a number of tons, zero or more')
      }
      return { kind: 'cargo', cargoCapacity: details.cargoCapacity }
    case 'military':
      if (!Number.isInteger(details.weaponCount) || details.weaponCount < 0) {
        throw new InvalidInputError('Weapon count must be a whole number, zero or more')
      }
      return {
        kind: 'military',
        weaponCount: details.weaponCount,
        authorisedByGov: details.authorisedByGov,
      }
  }
}

export const createBoat = (
  id: string,
  name: string,
  homePort: string,
  flag: string,
  options: NewBoatOptions = {},
): Boat => {
  const boat: Boat = {
    id: requireText(id, 'Boat id'),
    name: requireText(name, 'Boat name'),
    homePort,
    flag,
    details: validateKindDetails(options.details ?? { kind: 'standard' }),
    positions: [],
    arrivalLogs: [],
  }
  const launchDate = validateLaunchDate(options.launchDate)
  if (launchDate !== undefined) boat.launchDate = launchDate
  return boat
}

export const createPositionRecord = (
  latitude: number,
  longitude: number,
  timestamp: Date,
): PositionRecord => {
  if (!isValidLatitude(latitude)) {
    throw new InvalidInputError(`Latitude must be within [-90, 90], got ${latitude}`)
  }
  if (!isValidLongitude(longitude)) {
    throw new InvalidInputError(`Longitude must be within [-180, 180], got ${longitude}`)
  }
  return Object.freeze({ latitude, longitude, timestamp: toTimestamp(timestamp) })
}

export const createArrivalLogEntry = (
  port: string,
  timestamp: Date,
  note = '',
): ArrivalLogEntry =>
  Object.freeze({
    port: requireText(port, 'Arrival port'),
    timestamp: toTimestamp(timestamp),
    note,
  })

export const createActivityEntry = (message: string, timestamp: Date): FleetActivityEntry =>
  Object.freeze({ timestamp: toTimestamp(timestamp), message })

export const samePosition = (a: PositionRecord, b: PositionRecord) =>
  a.latitude === b.latitude && a.longitude === b.longitude && a.timestamp === b.timestamp

export const sameArrival = (a: ArrivalLogEntry, b: ArrivalLogEntry) =>
  a.port === b.port && a.timestamp === b.timestamp && a.note === b.note

export const sameBoat = (a: Pick<Boat, 'id'>, b: Pick<Boat, 'id'>) => a.id === b.id

/**
 * History entries are frozen and shared between copies; everything a caller
 * could mutate is duplicated.
 */
export const cloneBoat = (boat: Boat): Boat => ({
  ...boat,
  details: { ...boat.details },
  positions: [...boat.positions],
  arrivalLogs: [...boat.arrivalLogs],
})
