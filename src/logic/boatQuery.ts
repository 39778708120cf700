import type { Boat, BoatFilter, BoatSortKey } from '@/types/fleet'

const FILTER_FIELDS = ['name', 'homePort', 'flag'] as const

const contains = (value: string, needle: string) =>
  value.toLowerCase().includes(needle.toLowerCase())

/**
 * Every supplied field must appear (case-insensitively) in the matching
 * attribute. An empty filter keeps every boat.
 */
export const matchesFilter = (boat: Boat, filter: BoatFilter) =>
  FILTER_FIELDS.every((field) => {
    const needle = filter[field]
    return needle === undefined || contains(boat[field], needle)
  })

export const filterBoats = (boats: readonly Boat[], filter: BoatFilter) =>
  boats.filter((boat) => matchesFilter(boat, filter))

/** Single-keyword lookup across name, home port and flag. */
export const matchesKeyword = (boat: Boat, keyword: string) =>
  FILTER_FIELDS.some((field) => contains(boat[field], keyword))

export const compareBy = (key: BoatSortKey) => (a: Boat, b: Boat) => {
  const left = a[key].toLowerCase()
  const right = b[key].toLowerCase()
  if (left === right) return 0
  return left < right ? -1 : 1
}

// Array#sort is stable, so equal keys keep their input order.
export const sortBoats = (boats: readonly Boat[], key: BoatSortKey = 'name') =>
  [...boats].sort(compareBy(key))
