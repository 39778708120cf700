import { parseArgs } from 'node:util'
import type { Boat, BoatFilter, BoatKindDetails, BoatSortKey, Clock } from '@/types/fleet'
import { env } from '@/lib/env'
import { formatStatusReport } from '@/logic/statusReport'
import { openFleetRegistry, type FleetRegistry } from '@/state/fleetRegistry'
import { describeError, InvalidInputError } from '@/state/fleetErrors'

export type CommandIO = {
  out: (line: string) => void
  err: (line: string) => void
}

export type CommandOptions = {
  dataPath?: string
  clock?: Clock
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export const USAGE = [
  'Usage: fleet <command> [args]',
  '',
  '  add <id> <name> <homePort> <flag> [--kind standard|cargo|military]',
  '      [--capacity tons] [--weapons count] [--authorised] [--launched YYYY-MM-DD]',
  '  update <id> [--name X] [--port X] [--flag X] [--launched YYYY-MM-DD]',
  '  remove <id>',
  '  position <id> <latitude> <longitude>',
  '  arrival <id> <port> [note]',
  '  list [--sort name|homePort|flag|id]',
  '  filter [--name X] [--port X] [--flag X] [--sort key]',
  '  search <keyword>',
  '  history <id>',
  '  report',
  '  logs',
].join('\n')

const SORT_KEYS: BoatSortKey[] = ['name', 'homePort', 'flag', 'id']

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const formatCoordinates = (latitude: number, longitude: number) => `${latitude}, ${longitude}`

export const formatBoat = (boat: Boat) => {
  const last = boat.positions[boat.positions.length - 1]
  const lines = [
    `Ship ID: ${boat.id}`,
    `Ship Name: ${boat.name}`,
    `Type: ${boat.details.kind}`,
  ]
  if (boat.launchDate) lines.push(`Launch Date: ${boat.launchDate}`)
  lines.push(`Home Port: ${boat.homePort}`, `Flag: ${boat.flag}`)
  lines.push(
    last
      ? `Current Position: ${formatCoordinates(last.latitude, last.longitude)} (${last.timestamp})`
      : 'Current Position: Unknown',
  )
  if (boat.details.kind === 'cargo') {
    lines.push(`Cargo Capacity: ${boat.details.cargoCapacity.toFixed(2)} tons`)
  } else if (boat.details.kind === 'military') {
    lines.push(`Weapon Count: ${boat.details.weaponCount}`)
    lines.push(`Authorised by Government: ${boat.details.authorisedByGov ? 'yes' : 'no'}`)
  }
  return lines.join('\n')
}

const printBoats = (io: CommandIO, boats: Boat[], emptyMessage: string) => {
  if (!boats.length) {
    io.out(emptyMessage)
    return
  }
  io.out(boats.map(formatBoat).join('\n\n'))
}

// ---------------------------------------------------------------------------
// Argument helpers
// ---------------------------------------------------------------------------

const requirePositional = (positionals: string[], index: number, label: string) => {
  const value = positionals[index]
  if (value === undefined) {
    throw new UsageError(`Missing <${label}>`)
  }
  return value
}

const parseNumber = (raw: string, label: string) => {
  const value = Number(raw)
  if (!raw.trim() || !Number.isFinite(value)) {
    throw new InvalidInputError(`${label} must be a number, got "${raw}"`)
  }
  return value
}

const parseSortKey = (raw: string | undefined): BoatSortKey => {
  if (raw === undefined) return 'name'
  const key = SORT_KEYS.find((candidate) => candidate === raw)
  if (!key) {
    throw new UsageError(`Unknown sort key "${raw}" (expected one of ${SORT_KEYS.join(', ')})`)
  }
  return key
}

const parseKindDetails = (values: {
  kind?: string
  capacity?: string
  weapons?: string
  authorised?: boolean
}): BoatKindDetails => {
  switch (values.kind ?? 'standard') {
    case 'standard':
      return { kind: 'standard' }
    case 'cargo':
      if (values.capacity === undefined) throw new UsageError('Cargo boats need --capacity')
      return { kind: 'cargo', cargoCapacity: parseNumber(values.capacity, 'Cargo capacity') }
    case 'military':
      return {
        kind: 'military',
        weaponCount: parseNumber(values.weapons ?? '0', 'Weapon count'),
        authorisedByGov: values.authorised ?? false,
      }
    default:
      throw new UsageError(`Unknown boat kind "${values.kind}"`)
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

type CommandContext = {
  registry: FleetRegistry
  args: string[]
  io: CommandIO
}

/** Returns true when the registry changed and must be saved. */
type CommandHandler = (ctx: CommandContext) => boolean

const commands: Record<string, CommandHandler> = {
  add: ({ registry, args, io }) => {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        kind: { type: 'string' },
        capacity: { type: 'string' },
        weapons: { type: 'string' },
        authorised: { type: 'boolean' },
        launched: { type: 'string' },
      },
    })
    const boat = registry.addBoat(
      requirePositional(positionals, 0, 'id'),
      requirePositional(positionals, 1, 'name'),
      requirePositional(positionals, 2, 'homePort'),
      requirePositional(positionals, 3, 'flag'),
      { details: parseKindDetails(values), launchDate: values.launched },
    )
    io.out(`${boat.name} successfully added to fleet`)
    return true
  },

  update: ({ registry, args, io }) => {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        name: { type: 'string' },
        port: { type: 'string' },
        flag: { type: 'string' },
        launched: { type: 'string' },
      },
    })
    const id = requirePositional(positionals, 0, 'id')
    const fields = {
      name: values.name,
      homePort: values.port,
      flag: values.flag,
      launchDate: values.launched,
    }
    if (Object.values(fields).every((value) => value === undefined)) {
      io.out(`Nothing to update for ${registry.getBoat(id).name}`)
      return false
    }
    const boat = registry.updateBoat(id, fields)
    io.out(`${boat.name} updated`)
    return true
  },

  remove: ({ registry, args, io }) => {
    const id = requirePositional(args, 0, 'id')
    const { name } = registry.getBoat(id)
    registry.removeBoat(id)
    io.out(`${name} successfully removed from fleet`)
    return true
  },

  position: ({ registry, args, io }) => {
    const id = requirePositional(args, 0, 'id')
    const latitude = parseNumber(requirePositional(args, 1, 'latitude'), 'Latitude')
    const longitude = parseNumber(requirePositional(args, 2, 'longitude'), 'Longitude')
    registry.recordPosition(id, latitude, longitude)
    io.out(`${registry.getBoat(id).name} position logged: ${formatCoordinates(latitude, longitude)}`)
    return true
  },

  arrival: ({ registry, args, io }) => {
    const id = requirePositional(args, 0, 'id')
    const entry = registry.recordArrival(id, requirePositional(args, 1, 'port'), undefined, args[2] ?? '')
    io.out(`${registry.getBoat(id).name} arrival recorded at ${entry.port}`)
    return true
  },

  list: ({ registry, args, io }) => {
    const { values } = parseArgs({ args, options: { sort: { type: 'string' } } })
    const boats =
      values.sort === undefined
        ? registry.listBoats()
        : registry.sortBoats(registry.listBoats(), parseSortKey(values.sort))
    printBoats(io, boats, 'The fleet is empty!')
    return false
  },

  filter: ({ registry, args, io }) => {
    const { values } = parseArgs({
      args,
      options: {
        name: { type: 'string' },
        port: { type: 'string' },
        flag: { type: 'string' },
        sort: { type: 'string' },
      },
    })
    const filter: BoatFilter = {}
    if (values.name !== undefined) filter.name = values.name
    if (values.port !== undefined) filter.homePort = values.port
    if (values.flag !== undefined) filter.flag = values.flag
    const matches = registry.sortBoats(registry.filterBoats(filter), parseSortKey(values.sort))
    printBoats(io, matches, 'No boats match the filter.')
    return false
  },

  search: ({ registry, args, io }) => {
    const keyword = requirePositional(args, 0, 'keyword')
    printBoats(io, registry.searchBoats(keyword), `No results found for ${keyword}.`)
    return false
  },

  history: ({ registry, args, io }) => {
    const id = requirePositional(args, 0, 'id')
    const boat = registry.getBoat(id)
    if (!boat.positions.length && !boat.arrivalLogs.length) {
      io.out(`No position or arrival logs recorded for ${boat.name}.`)
      return false
    }
    const lines: string[] = []
    if (boat.positions.length) lines.push(`Position History for ${boat.name}:`)
    for (const p of boat.positions) {
      lines.push(`[${p.timestamp}] Position: ${formatCoordinates(p.latitude, p.longitude)}`)
    }
    if (boat.arrivalLogs.length) lines.push(`Arrivals for ${boat.name}:`)
    for (const a of boat.arrivalLogs) {
      lines.push(`[${a.timestamp}] Arrived at ${a.port}${a.note ? ` (${a.note})` : ''}`)
    }
    io.out(lines.join('\n'))
    return false
  },

  report: ({ registry, io }) => {
    io.out(formatStatusReport(registry.statusReport()))
    return false
  },

  logs: ({ registry, io }) => {
    const entries = registry.listActivity()
    io.out(
      entries.length
        ? entries.map((entry) => `[${entry.timestamp}] ${entry.message}`).join('\n')
        : 'No logs recorded yet.',
    )
    return false
  },
}

export const runFleetCommand = (argv: string[], io: CommandIO, options: CommandOptions = {}) => {
  const [name, ...args] = argv
  const handler = name !== undefined && Object.hasOwn(commands, name) ? commands[name] : undefined
  if (!handler) {
    io.err(name === undefined ? USAGE : `Unknown command "${name}"\n\n${USAGE}`)
    return EXIT_USAGE
  }

  const dataPath = options.dataPath ?? env.dataPath
  try {
    const registry = openFleetRegistry(dataPath, { clock: options.clock })
    if (handler({ registry, args, io })) {
      registry.save(dataPath)
    }
    return EXIT_OK
  } catch (error) {
    if (error instanceof UsageError || isParseArgsError(error)) {
      io.err(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`)
      return EXIT_USAGE
    }
    io.err(describeError(error))
    return EXIT_FAILURE
  }
}

const isParseArgsError = (error: unknown) =>
  error instanceof TypeError &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('ERR_PARSE_ARGS')
