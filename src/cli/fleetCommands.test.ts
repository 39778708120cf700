import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runFleetCommand, USAGE } from './fleetCommands'

const NOW = '2024-05-01T10:00:00.000Z'

let tmpDir: string
let dataPath: string
let out: string[]
let err: string[]

const run = (...argv: string[]) =>
  runFleetCommand(
    argv,
    { out: (line) => out.push(line), err: (line) => err.push(line) },
    { dataPath, clock: () => new Date(NOW) },
  )

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleet-cli-'))
  dataPath = path.join(tmpDir, 'fleet_data.json')
  out = []
  err = []
  vi.spyOn(console, 'info').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

describe('runFleetCommand', () => {
  it('adds a boat and saves it', () => {
    expect(run('add', 'B1', 'Orion', 'Oslo', 'NO')).toBe(EXIT_OK)
    expect(out).toEqual(['Orion successfully added to fleet'])
    const doc = JSON.parse(fs.readFileSync(dataPath, 'utf8'))
    expect(doc.boats.map((b: { id: string }) => b.id)).toEqual(['B1'])
  })

  it('records history across invocations and lists it', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    expect(run('position', 'B1', '45', '-122')).toBe(EXIT_OK)
    expect(run('arrival', 'B1', 'Seattle', 'on schedule')).toBe(EXIT_OK)
    out = []

    expect(run('list')).toBe(EXIT_OK)
    expect(out).toEqual([
      [
        'Ship ID: B1',
        'Ship Name: Orion',
        'Type: standard',
        'Home Port: Oslo',
        'Flag: NO',
        `Current Position: 45, -122 (${NOW})`,
      ].join('\n'),
    ])

    out = []
    expect(run('history', 'B1')).toBe(EXIT_OK)
    expect(out).toEqual([
      [
        'Position History for Orion:',
        `[${NOW}] Position: 45, -122`,
        'Arrivals for Orion:',
        `[${NOW}] Arrived at Seattle (on schedule)`,
      ].join('\n'),
    ])
  })

  it('omits the arrivals heading when a boat has only positions', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    run('position', 'B1', '45', '-122')
    out = []
    expect(run('history', 'B1')).toBe(EXIT_OK)
    expect(out).toEqual([`Position History for Orion:\n[${NOW}] Position: 45, -122`])
  })

  it('reports an update with no fields without touching the file', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    const before = fs.readFileSync(dataPath, 'utf8')
    out = []
    expect(run('update', 'B1')).toBe(EXIT_OK)
    expect(out).toEqual(['Nothing to update for Orion'])
    expect(fs.readFileSync(dataPath, 'utf8')).toBe(before)
  })

  it('keeps log lines out of command output', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    run('list')
    expect(console.info).not.toHaveBeenCalled()
  })

  it('shows cargo details', () => {
    run('add', 'C1', 'Hauler', 'Rotterdam', 'NL', '--kind', 'cargo', '--capacity', '1000')
    out = []
    run('list')
    expect(out[0]).toContain('Type: cargo')
    expect(out[0].split('\n').at(-1)).toBe('Cargo Capacity: 1000.00 tons')
  })

  it('filters and sorts', () => {
    run('add', 'B1', 'Pelican', 'San Diego', 'US')
    run('add', 'B2', 'gull', 'Santos', 'BR')
    run('add', 'B3', 'Heron', 'Miami', 'US')
    out = []
    run('filter', '--port', 'san', '--sort', 'name')
    expect(out).toHaveLength(1)
    expect(out[0].split('\n\n').map((block) => block.split('\n')[1])).toEqual([
      'Ship Name: gull',
      'Ship Name: Pelican',
    ])
  })

  it('reports an empty fleet without creating a file', () => {
    expect(run('report')).toBe(EXIT_OK)
    expect(out).toEqual(['Fleet Status Report\n\nFleet is currently empty.'])
    expect(fs.existsSync(dataPath)).toBe(false)
  })

  it('prints the activity log', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    run('remove', 'B1')
    out = []
    run('logs')
    expect(out).toEqual([
      `[${NOW}] Orion joined the fleet.\n[${NOW}] Orion was removed from the fleet.`,
    ])
  })

  it('returns a failure for registry errors and does not save', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    const before = fs.readFileSync(dataPath, 'utf8')

    expect(run('remove', 'B9')).toBe(EXIT_FAILURE)
    expect(run('position', 'B1', '95', '0')).toBe(EXIT_FAILURE)
    expect(run('add', 'B1', 'Again', 'Oslo', 'NO')).toBe(EXIT_FAILURE)
    expect(err).toEqual([
      'Boat not found: B9',
      'Latitude must be within [-90, 90], got 95',
      'A boat with id B1 already exists',
    ])
    expect(fs.readFileSync(dataPath, 'utf8')).toBe(before)
  })

  it('rejects a non-numeric coordinate', () => {
    run('add', 'B1', 'Orion', 'Oslo', 'NO')
    expect(run('position', 'B1', 'north', '0')).toBe(EXIT_FAILURE)
    expect(err).toEqual(['Latitude must be a number, got "north"'])
  })

  it('returns a usage error for unknown commands and missing arguments', () => {
    expect(run()).toBe(EXIT_USAGE)
    expect(run('fly')).toBe(EXIT_USAGE)
    expect(run('add', 'B1')).toBe(EXIT_USAGE)
    expect(err).toEqual([USAGE, `Unknown command "fly"\n\n${USAGE}`, `Missing <name>\n\n${USAGE}`])
  })

  it('does not treat inherited object keys as commands', () => {
    expect(run('constructor')).toBe(EXIT_USAGE)
  })

  it('returns a usage error for unknown options', () => {
    expect(run('list', '--bogus')).toBe(EXIT_USAGE)
    expect(err).toHaveLength(1)
  })

  it('reports a corrupt data file', () => {
    fs.writeFileSync(dataPath, JSON.stringify({ boats: [{ name: 'No Id' }] }))
    expect(run('list')).toBe(EXIT_FAILURE)
    expect(err).toEqual(['Saved fleet data is invalid: boats.0.id: Required'])
  })
})
