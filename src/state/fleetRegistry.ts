import type {
  ArrivalLogEntry,
  Boat,
  BoatFilter,
  BoatSortKey,
  BoatUpdate,
  Clock,
  FleetActivityEntry,
  FleetSnapshot,
  NewBoatOptions,
  PositionRecord,
} from '@/types/fleet'
import { env } from '@/lib/env'
import { filterBoats, matchesKeyword, sortBoats } from '@/logic/boatQuery'
import { buildStatusReport, type FleetStatusReport } from '@/logic/statusReport'
import { fleetFileExists, readFleetFile, writeFleetFile } from '@/db/fleetStorage'
import {
  cloneBoat,
  createActivityEntry,
  createArrivalLogEntry,
  createBoat,
  createPositionRecord,
  validateLaunchDate,
} from './factories'
import { DuplicateIdError, FleetError, InvalidInputError, NotFoundError } from './fleetErrors'

export type FleetRegistryOptions = {
  clock?: Clock
  /** Indentation of saved documents; defaults to FLEET_JSON_INDENT. */
  jsonIndent?: number
}

const systemClock: Clock = () => new Date()

const debug = (message: string, details?: Record<string, unknown>) => {
  if (!env.debugLogs) return
  console.debug(`[registry] ${message}`, details ?? {})
}

const failureDetails = (path: string, error: unknown) => ({
  path,
  code: error instanceof FleetError ? error.code : undefined,
  message: error instanceof Error ? error.message : String(error),
})

/**
 * Owns every boat of one fleet. Operations run to completion one at a time;
 * callers that share an instance across concurrent requests must serialize
 * access themselves. Nothing is written to disk until `save` is called.
 */
export class FleetRegistry {
  // Map iteration order is insertion order, which listBoats relies on.
  private boats = new Map<string, Boat>()

  private activity: FleetActivityEntry[] = []

  private readonly clock: Clock

  private readonly jsonIndent?: number

  constructor(options: FleetRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.jsonIndent = options.jsonIndent
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  addBoat(id: string, name: string, homePort: string, flag: string, options: NewBoatOptions = {}): Boat {
    if (this.boats.has(id)) {
      throw new DuplicateIdError(id)
    }
    const boat = createBoat(id, name, homePort, flag, options)
    this.boats.set(id, boat)
    this.log(`${boat.name} joined the fleet.`)
    debug('boat added', { id, kind: boat.details.kind })
    return cloneBoat(boat)
  }

  updateBoat(id: string, fields: BoatUpdate): Boat {
    const boat = this.require(id)
    if (fields.name !== undefined && !fields.name.trim()) {
      throw new InvalidInputError('Boat name must be a non-empty string')
    }
    const launchDate = validateLaunchDate(fields.launchDate)
    const supplied = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key)
    if (!supplied.length) {
      return cloneBoat(boat)
    }

    if (fields.name !== undefined) boat.name = fields.name
    if (fields.homePort !== undefined) boat.homePort = fields.homePort
    if (fields.flag !== undefined) boat.flag = fields.flag
    if (launchDate !== undefined) boat.launchDate = launchDate

    this.log(`${boat.name} details updated.`)
    debug('boat updated', { id, fields: supplied })
    return cloneBoat(boat)
  }

  removeBoat(id: string): void {
    const boat = this.require(id)
    this.boats.delete(id)
    this.log(`${boat.name} was removed from the fleet.`)
    debug('boat removed', { id })
  }

  recordPosition(id: string, latitude: number, longitude: number, timestamp?: Date): PositionRecord {
    const boat = this.require(id)
    const record = createPositionRecord(latitude, longitude, timestamp ?? this.clock())
    boat.positions.push(record)
    debug('position recorded', { id, latitude, longitude })
    return record
  }

  recordArrival(id: string, port: string, timestamp?: Date, note = ''): ArrivalLogEntry {
    const boat = this.require(id)
    const entry = createArrivalLogEntry(port, timestamp ?? this.clock(), note)
    boat.arrivalLogs.push(entry)
    this.log(`${boat.name} arrived at ${entry.port}.`)
    debug('arrival recorded', { id, port })
    return entry
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  get size() {
    return this.boats.size
  }

  getBoat(id: string): Boat {
    return cloneBoat(this.require(id))
  }

  hasBoat(id: string) {
    return this.boats.has(id)
  }

  listBoats(): Boat[] {
    return Array.from(this.boats.values(), cloneBoat)
  }

  filterBoats(filter: BoatFilter = {}): Boat[] {
    return filterBoats(this.listBoats(), filter)
  }

  searchBoats(keyword: string): Boat[] {
    const needle = keyword.trim()
    if (!needle) {
      throw new InvalidInputError('Search keyword must be a non-empty string')
    }
    return this.listBoats().filter((boat) => matchesKeyword(boat, needle))
  }

  /** Sorted copy of `boats` (all boats when omitted); the registry is untouched. */
  sortBoats(boats: readonly Boat[] = this.listBoats(), key: BoatSortKey = 'name'): Boat[] {
    return sortBoats(boats, key)
  }

  currentPosition(id: string): PositionRecord | null {
    const { positions } = this.require(id)
    return positions.length ? positions[positions.length - 1] : null
  }

  positionHistory(id: string): PositionRecord[] {
    return [...this.require(id).positions]
  }

  arrivalHistory(id: string): ArrivalLogEntry[] {
    return [...this.require(id).arrivalLogs]
  }

  listActivity(): FleetActivityEntry[] {
    return [...this.activity]
  }

  statusReport(recentCount = env.reportRecentCount): FleetStatusReport {
    return buildStatusReport(Array.from(this.boats.values()), this.activity, recentCount)
  }

  snapshot(): FleetSnapshot {
    return { boats: this.listBoats(), activity: this.listActivity() }
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  save(path: string = env.dataPath): void {
    try {
      writeFleetFile(path, this.snapshot(), { savedAt: this.clock(), indent: this.jsonIndent })
    } catch (error) {
      console.warn('[registry] save failed', failureDetails(path, error))
      throw error
    }
    debug(`saved ${this.boats.size} boats to ${path}`)
  }

  /** Replaces the whole registry with the file contents; on failure nothing changes. */
  load(path: string = env.dataPath): void {
    let snapshot: FleetSnapshot
    try {
      snapshot = readFleetFile(path)
    } catch (error) {
      console.warn('[registry] load failed', failureDetails(path, error))
      throw error
    }
    this.replace(snapshot)
    debug(`loaded ${this.boats.size} boats from ${path}`)
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private replace(snapshot: FleetSnapshot) {
    const next = new Map<string, Boat>()
    for (const boat of snapshot.boats) {
      next.set(boat.id, cloneBoat(boat))
    }
    this.boats = next
    this.activity = [...snapshot.activity]
  }

  private require(id: string): Boat {
    const boat = this.boats.get(id)
    if (!boat) {
      throw new NotFoundError(id)
    }
    return boat
  }

  // Activity is stamped with the clock, even when a history entry is back-dated.
  private log(message: string) {
    this.activity.push(createActivityEntry(message, this.clock()))
  }
}

/**
 * Start-up entry point: rehydrates from `path` when the file exists and
 * starts empty otherwise. Any other load failure propagates.
 */
export const openFleetRegistry = (path: string = env.dataPath, options: FleetRegistryOptions = {}) => {
  const registry = new FleetRegistry(options)
  if (!fleetFileExists(path)) {
    debug(`no saved fleet data at ${path}, starting with an empty fleet`)
    return registry
  }
  registry.load(path)
  return registry
}
