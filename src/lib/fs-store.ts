/**
 * Filesystem helpers for all-or-nothing writes
 *
 * Content is written to a temporary sibling file and renamed over the target,
 * so readers see either the old file or the complete new one.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'

// =============================================================================
// Types
// =============================================================================

export interface FileWrite {
  path: string
  /** Strings are written as UTF-8; buffers byte for byte */
  content: string | Buffer
}

export interface StagedWrite extends FileWrite {
  tempPath: string
}

/**
 * Raised by the staged writers; carries the target that failed
 */
export class StagedWriteFailure extends Error {
  readonly target: string

  constructor(target: string, cause: unknown) {
    const error = cause instanceof Error ? cause : new Error(String(cause))
    super(error.message, { cause: error })
    this.name = 'StagedWriteFailure'
    this.target = target
  }
}

// =============================================================================
// Temp files
// =============================================================================

let tempCounter = 0

export function getTempPath(target: string): string {
  tempCounter++
  return join(dirname(target), `.${basename(target)}.${process.pid}.${tempCounter}.tmp`)
}

function removeQuietly(filePath: string): void {
  rmSync(filePath, { force: true })
}

/**
 * Write every file to its temp path. If any write fails, the temps already
 * written are removed and the error is rethrown with the failing target.
 */
export function stageWrites(writes: readonly FileWrite[]): StagedWrite[] {
  const staged: StagedWrite[] = []
  let target = ''
  try {
    for (const write of writes) {
      target = write.path
      mkdirSync(dirname(write.path), { recursive: true })
      const tempPath = getTempPath(write.path)
      staged.push({ ...write, tempPath })
      writeFileSync(tempPath, write.content)
    }
  } catch (error) {
    for (const item of staged) removeQuietly(item.tempPath)
    throw new StagedWriteFailure(target, error)
  }
  return staged
}

/**
 * Rename staged temps over their targets, in order
 */
export function publishWrites(staged: readonly StagedWrite[]): void {
  for (let i = 0; i < staged.length; i++) {
    try {
      renameSync(staged[i].tempPath, staged[i].path)
    } catch (error) {
      for (const item of staged.slice(i)) removeQuietly(item.tempPath)
      throw new StagedWriteFailure(staged[i].path, error)
    }
  }
}

/**
 * Write one file atomically
 */
export function writeFileAtomic(filePath: string, content: string | Buffer): void {
  publishWrites(stageWrites([{ path: filePath, content }]))
}

/**
 * Write several files, staging all of them before any target is replaced
 */
export function writeFilesAtomic(writes: readonly FileWrite[]): void {
  publishWrites(stageWrites(writes))
}

/**
 * Append by rewriting: existing bytes + addition, swapped in atomically.
 * The existing bytes are copied unchanged, whatever their encoding.
 * When the file does not exist yet, `initial` is written ahead of the addition.
 */
export function appendFileAtomic(filePath: string, addition: string, initial: string = ''): void {
  const existing = existsSync(filePath) ? readFileSync(filePath) : Buffer.from(initial, 'utf-8')
  writeFileAtomic(filePath, Buffer.concat([existing, Buffer.from(addition, 'utf-8')]))
}
