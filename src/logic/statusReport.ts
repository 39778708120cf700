import type { Boat, BoatKind, FleetActivityEntry } from '@/types/fleet'

export type FleetStatusReport = {
  totalBoats: number
  byKind: Record<BoatKind, number>
  totalCargoCapacity: number
  totalPositions: number
  totalArrivals: number
  recentActivity: FleetActivityEntry[]
}

export const buildStatusReport = (
  boats: readonly Boat[],
  activity: readonly FleetActivityEntry[],
  recentCount: number,
): FleetStatusReport => {
  const byKind: Record<BoatKind, number> = { standard: 0, cargo: 0, military: 0 }
  let totalCargoCapacity = 0
  let totalPositions = 0
  let totalArrivals = 0

  for (const boat of boats) {
    byKind[boat.details.kind] += 1
    if (boat.details.kind === 'cargo') {
      totalCargoCapacity += boat.details.cargoCapacity
    }
    totalPositions += boat.positions.length
    totalArrivals += boat.arrivalLogs.length
  }

  return {
    totalBoats: boats.length,
    byKind,
    totalCargoCapacity,
    totalPositions,
    totalArrivals,
    recentActivity: recentCount > 0 ? activity.slice(-recentCount) : [],
  }
}

export const formatStatusReport = (report: FleetStatusReport) => {
  if (report.totalBoats === 0) {
    return 'Fleet Status Report\n\nFleet is currently empty.'
  }

  const lines = [
    'Fleet Status Report',
    '',
    `Total Boats: ${report.totalBoats}`,
    `Standard Boats: ${report.byKind.standard}`,
    `Cargo Boats: ${report.byKind.cargo}`,
    `Military Boats: ${report.byKind.military}`,
  ]
  if (report.byKind.cargo > 0) {
    lines.push(`Total Cargo Capacity: ${report.totalCargoCapacity.toFixed(2)} tons`)
  }
  lines.push(`Recorded Positions: ${report.totalPositions}`)
  lines.push(`Recorded Arrivals: ${report.totalArrivals}`)

  if (report.recentActivity.length) {
    lines.push('', 'Recent Activity:')
    for (const entry of report.recentActivity) {
      lines.push(`[${entry.timestamp}] ${entry.message}`)
    }
  }
  return lines.join('\n')
}
