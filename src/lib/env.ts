import { config } from 'dotenv'

// Local overrides live in .env next to the working directory; real environment wins.
config()

export const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

export const toBool = (value: string | undefined, fallback = false) => {
  if (!value) return fallback
  const normalized = value.trim().toLowerCase()
  return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

const rawEnv = process.env

export const env = {
  dataPath: rawEnv.FLEET_DATA_PATH?.trim() || 'fleet_data.json',
  jsonIndent: Math.max(0, Math.floor(toNumber(rawEnv.FLEET_JSON_INDENT, 2))),
  debugLogs: toBool(rawEnv.FLEET_DEBUG_LOGS, false),
  reportRecentCount: Math.max(0, Math.floor(toNumber(rawEnv.FLEET_REPORT_RECENT, 5))),
} as const

export type FleetEnv = typeof env
