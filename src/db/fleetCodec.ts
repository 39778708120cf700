import { z } from 'zod'
import type {
  ArrivalLogEntry,
  Boat,
  BoatKindDetails,
  FleetActivityEntry,
  FleetSnapshot,
  PositionRecord,
} from '@/types/fleet'
import { isValidLaunchDate, LATITUDE_RANGE, LONGITUDE_RANGE } from '@/state/factories'
import { SchemaError } from '@/state/fleetErrors'

export const FLEET_DOCUMENT_VERSION = 1

// ---------------------------------------------------------------------------
// Schemas (on-disk layout, snake_case)
// ---------------------------------------------------------------------------

const nonEmpty = z.string().refine((value) => value.trim().length > 0, 'must be a non-empty string')

const isoTimestamp = z.string().datetime({ offset: true, message: 'must be an ISO-8601 timestamp' })

const positionSchema = z.object({
  latitude: z.number().min(LATITUDE_RANGE[0]).max(LATITUDE_RANGE[1]),
  longitude: z.number().min(LONGITUDE_RANGE[0]).max(LONGITUDE_RANGE[1]),
  timestamp: isoTimestamp,
})

const arrivalSchema = z.object({
  port: nonEmpty,
  timestamp: isoTimestamp,
  note: z.string().default(''),
})

const activitySchema = z.object({
  timestamp: isoTimestamp,
  message: z.string(),
})

const boatSchema = z
  .object({
    id: nonEmpty,
    name: nonEmpty,
    home_port: z.string().default(''),
    flag: z.string().default(''),
    launch_date: z.string().refine(isValidLaunchDate, 'must be a YYYY-MM-DD date').optional(),
    kind: z.enum(['standard', 'cargo', 'military']).optional(),
    cargo_capacity: z.number().min(0).optional(),
    weapon_count: z.number().int().min(0).optional(),
    is_authorised_by_gov: z.boolean().optional(),
    positions: z.array(positionSchema).default([]),
    arrival_logs: z.array(arrivalSchema).default([]),
  })
  .superRefine((boat, ctx) => {
    if (boat.kind === 'cargo' && boat.cargo_capacity === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cargo_capacity'],
        message: 'is required for cargo boats',
      })
    }
    if (boat.kind === 'military' && boat.weapon_count === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weapon_count'],
        message: 'is required for military boats',
      })
    }
  })

export const fleetDocumentSchema = z
  .object({
    version: z
      .number()
      .int()
      .min(1)
      .max(FLEET_DOCUMENT_VERSION, `unsupported version (newest known is ${FLEET_DOCUMENT_VERSION})`)
      .optional(),
    saved_at: isoTimestamp.optional(),
    boats: z.array(boatSchema),
    logs: z.array(activitySchema).default([]),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>()
    doc.boats.forEach((boat, index) => {
      if (seen.has(boat.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['boats', index, 'id'],
          message: `duplicate boat id ${boat.id}`,
        })
      }
      seen.add(boat.id)
    })
  })

export type FleetDocument = z.infer<typeof fleetDocumentSchema>
type BoatDocument = z.infer<typeof boatSchema>

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

const encodeBoat = (boat: Boat): BoatDocument => {
  const doc: BoatDocument = {
    id: boat.id,
    name: boat.name,
    home_port: boat.homePort,
    flag: boat.flag,
    kind: boat.details.kind,
    positions: boat.positions.map((p) => ({
      latitude: p.latitude,
      longitude: p.longitude,
      timestamp: p.timestamp,
    })),
    arrival_logs: boat.arrivalLogs.map((a) => ({
      port: a.port,
      timestamp: a.timestamp,
      note: a.note,
    })),
  }
  if (boat.launchDate !== undefined) doc.launch_date = boat.launchDate
  if (boat.details.kind === 'cargo') {
    doc.cargo_capacity = boat.details.cargoCapacity
  } else if (boat.details.kind === 'military') {
    doc.weapon_count = boat.details.weaponCount
    doc.is_authorised_by_gov = boat.details.authorisedByGov
  }
  return doc
}

export const encodeFleet = (snapshot: FleetSnapshot, savedAt: Date): FleetDocument => ({
  version: FLEET_DOCUMENT_VERSION,
  saved_at: savedAt.toISOString(),
  boats: snapshot.boats.map(encodeBoat),
  logs: snapshot.activity.map((entry) => ({ timestamp: entry.timestamp, message: entry.message })),
})

export const serializeFleet = (snapshot: FleetSnapshot, savedAt: Date, indent = 2) =>
  `${JSON.stringify(encodeFleet(snapshot, savedAt), null, indent)}\n`

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/** Documents written before `kind` existed are classified by their extra fields. */
const decodeKind = (doc: BoatDocument): BoatKindDetails => {
  const kind =
    doc.kind ??
    (doc.cargo_capacity !== undefined
      ? 'cargo'
      : doc.weapon_count !== undefined
        ? 'military'
        : 'standard')
  if (kind === 'cargo') {
    return { kind, cargoCapacity: doc.cargo_capacity ?? 0 }
  }
  if (kind === 'military') {
    return {
      kind,
      weaponCount: doc.weapon_count ?? 0,
      authorisedByGov: doc.is_authorised_by_gov ?? false,
    }
  }
  return { kind: 'standard' }
}

const decodeBoat = (doc: BoatDocument): Boat => {
  const boat: Boat = {
    id: doc.id,
    name: doc.name,
    homePort: doc.home_port,
    flag: doc.flag,
    details: decodeKind(doc),
    positions: doc.positions.map(
      (p): PositionRecord =>
        Object.freeze({ latitude: p.latitude, longitude: p.longitude, timestamp: p.timestamp }),
    ),
    arrivalLogs: doc.arrival_logs.map(
      (a): ArrivalLogEntry => Object.freeze({ port: a.port, timestamp: a.timestamp, note: a.note }),
    ),
  }
  if (doc.launch_date !== undefined) boat.launchDate = doc.launch_date
  return boat
}

const formatIssuePath = (path: (string | number)[]) => (path.length ? path.join('.') : '(root)')

export const decodeFleet = (document: unknown, source: string): FleetSnapshot => {
  const result = fleetDocumentSchema.safeParse(document)
  if (!result.success) {
    throw new SchemaError(
      source,
      result.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`),
    )
  }
  return {
    boats: result.data.boats.map(decodeBoat),
    activity: result.data.logs.map(
      (entry): FleetActivityEntry => Object.freeze({ timestamp: entry.timestamp, message: entry.message }),
    ),
  }
}

export const deserializeFleet = (text: string, source: string): FleetSnapshot => {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new SchemaError(source, [
      `(root): not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    ])
  }
  return decodeFleet(parsed, source)
}
