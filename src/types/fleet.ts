export type PositionRecord = {
  readonly latitude: number
  readonly longitude: number
  /** ISO-8601 instant the fix was taken. */
  readonly timestamp: string
}

export type ArrivalLogEntry = {
  readonly port: string
  readonly timestamp: string
  readonly note: string
}

export type FleetActivityEntry = {
  readonly timestamp: string
  readonly message: string
}

export type BoatKind = 'standard' | 'cargo' | 'military'

export type BoatKindDetails =
  | { kind: 'standard' }
  | { kind: 'cargo'; cargoCapacity: number }
  | { kind: 'military'; weaponCount: number; authorisedByGov: boolean }

export type Boat = {
  id: string
  name: string
  homePort: string
  flag: string
  /** Calendar date (YYYY-MM-DD) the hull was launched, when known. */
  launchDate?: string
  details: BoatKindDetails
  positions: PositionRecord[]
  arrivalLogs: ArrivalLogEntry[]
}

export type NewBoatOptions = {
  launchDate?: string
  details?: BoatKindDetails
}

export type BoatUpdate = Partial<Pick<Boat, 'name' | 'homePort' | 'flag' | 'launchDate'>>

export type BoatFilter = Partial<Pick<Boat, 'name' | 'homePort' | 'flag'>>

export type BoatSortKey = 'name' | 'homePort' | 'flag' | 'id'

/** Complete registry contents, as held in memory and exchanged with the codec. */
export type FleetSnapshot = {
  boats: Boat[]
  activity: FleetActivityEntry[]
}

export type Clock = () => Date
