import { describe, it, expect } from 'vitest'
import { filterBoats, matchesFilter, matchesKeyword, sortBoats } from '@/logic/boatQuery'
import type { Boat } from '@/types/fleet'

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

const makeBoat = (overrides: Partial<Boat> & { id: string }): Boat => ({
  name: overrides.id,
  homePort: '',
  flag: '',
  details: { kind: 'standard' },
  positions: [],
  arrivalLogs: [],
  ...overrides,
})

const fleet = [
  makeBoat({ id: 'a', name: 'Pelican', homePort: 'San Diego', flag: 'US' }),
  makeBoat({ id: 'b', name: 'Gull', homePort: 'Santos', flag: 'BR' }),
  makeBoat({ id: 'c', name: 'Heron', homePort: 'Miami', flag: 'US' }),
]

describe('matchesFilter', () => {
  it('treats omitted fields as unconstrained', () => {
    expect(matchesFilter(fleet[0], {})).toBe(true)
    expect(matchesFilter(fleet[0], { flag: 'u' })).toBe(true)
  })

  it('requires every supplied field to match', () => {
    expect(matchesFilter(fleet[0], { name: 'pel', flag: 'br' })).toBe(false)
  })

  it('matches an empty needle against any value', () => {
    expect(matchesFilter(fleet[2], { homePort: '' })).toBe(true)
  })
})

describe('filterBoats', () => {
  it('matches home ports containing "san" regardless of case', () => {
    expect(filterBoats(fleet, { homePort: 'san' }).map((b) => b.homePort)).toEqual([
      'San Diego',
      'Santos',
    ])
  })

  it('keeps input order', () => {
    expect(filterBoats(fleet, { flag: 'US' }).map((b) => b.id)).toEqual(['a', 'c'])
  })
})

describe('matchesKeyword', () => {
  it('matches any of name, port or flag', () => {
    expect(matchesKeyword(fleet[1], 'gul')).toBe(true)
    expect(matchesKeyword(fleet[1], 'TOS')).toBe(true)
    expect(matchesKeyword(fleet[1], 'br')).toBe(true)
    expect(matchesKeyword(fleet[1], 'miami')).toBe(false)
  })
})

describe('sortBoats', () => {
  it('orders names case-insensitively', () => {
    const boats = ['Zeta', 'alpha', 'Beta'].map((name) => makeBoat({ id: name, name }))
    expect(sortBoats(boats).map((b) => b.name)).toEqual(['alpha', 'Beta', 'Zeta'])
  })

  it('is stable for equal keys', () => {
    const boats = [
      makeBoat({ id: '1', name: 'orca' }),
      makeBoat({ id: '2', name: 'Anchor' }),
      makeBoat({ id: '3', name: 'ORCA' }),
      makeBoat({ id: '4', name: 'Orca' }),
    ]
    expect(sortBoats(boats).map((b) => b.id)).toEqual(['2', '1', '3', '4'])
  })

  it('sorts by other keys', () => {
    expect(sortBoats(fleet, 'homePort').map((b) => b.id)).toEqual(['c', 'a', 'b'])
    expect(sortBoats(fleet, 'flag').map((b) => b.id)).toEqual(['b', 'a', 'c'])
  })

  it('does not mutate its input', () => {
    const input = [...fleet].reverse()
    const ids = input.map((b) => b.id)
    sortBoats(input)
    expect(input.map((b) => b.id)).toEqual(ids)
  })
})
