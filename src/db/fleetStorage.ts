import fs from 'node:fs'
import path from 'node:path'
import type { FleetSnapshot } from '@/types/fleet'
import { env } from '@/lib/env'
import { PersistenceError } from '@/state/fleetErrors'
import { deserializeFleet, serializeFleet } from './fleetCodec'

const errorCode = (error: unknown) =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

const tempPathFor = (target: string) =>
  path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${Date.now().toString(36)}.tmp`,
  )

/** Opens `file`, hands the descriptor to `fn` and closes it on every exit path. */
const withFileDescriptor = <T>(file: string, flags: string, fn: (fd: number) => T): T => {
  const fd = fs.openSync(file, flags)
  try {
    return fn(fd)
  } finally {
    fs.closeSync(fd)
  }
}

const removeQuietly = (file: string) => {
  try {
    fs.rmSync(file, { force: true })
  } catch (error) {
    console.warn('[storage] failed to remove temp file', { file, message: errorMessage(error) })
  }
}

export type WriteOptions = {
  savedAt: Date
  indent?: number
}

/**
 * Replaces `target` with the encoded snapshot. The document is written to a
 * sibling temp file, flushed, then renamed over the target, so readers see
 * either the old file or the new one.
 */
export const writeFleetFile = (target: string, snapshot: FleetSnapshot, options: WriteOptions) => {
  const tempPath = tempPathFor(target)
  try {
    const payload = serializeFleet(snapshot, options.savedAt, options.indent ?? env.jsonIndent)
    withFileDescriptor(tempPath, 'wx', (fd) => {
      fs.writeFileSync(fd, payload, 'utf8')
      fs.fsyncSync(fd)
    })
    fs.renameSync(tempPath, target)
  } catch (error) {
    removeQuietly(tempPath)
    throw new PersistenceError(target, `Failed to save fleet data to ${target}: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

export const readFleetFile = (source: string): FleetSnapshot => {
  let text: string
  try {
    text = withFileDescriptor(source, 'r', (fd) => fs.readFileSync(fd, 'utf8'))
  } catch (error) {
    const reason = errorCode(error) === 'ENOENT' ? 'file does not exist' : errorMessage(error)
    throw new PersistenceError(source, `Failed to load fleet data from ${source}: ${reason}`, {
      cause: error,
    })
  }
  return deserializeFleet(text, source)
}

export const fleetFileExists = (source: string) => fs.existsSync(source)
