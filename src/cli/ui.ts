/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): messages, colors and a progress spinner on stderr
 * - Pipe: clean output, data only to stdout
 */

import { getSpinnerConfig } from 'tuiuiu.js'
import type { SpinnerStyle } from 'tuiuiu.js'
import { c, print, symbols } from './lib/colors.js'

// Spinner frames only when stderr is a terminal
export const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false

/**
 * Suppress non-essential stderr messages (--quiet)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (!quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with the verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[azcatalog] ${message}`)
  }
}

/**
 * Log success message
 */
export function success(message: string): void {
  if (!quiet) {
    console.error(`${symbols.success} ${message}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  print.warning(message)
}

// ============================================================================
// Spinner
// ============================================================================

export interface Spinner {
  start(): void
  stop(finalText?: string): void
  update(text: string): void
  succeed(msg?: string): void
  fail(msg?: string): void
}

/**
 * Spinner on stderr, frames and pace from tuiuiu.js
 */
export function createSpinner(text: string, spinnerStyle: SpinnerStyle = 'dots'): Spinner {
  if (quiet) {
    return { start: () => {}, stop: () => {}, update: () => {}, succeed: () => {}, fail: () => {} }
  }

  if (!isStderrTTY) {
    // Plain lines for non-TTY
    return {
      start: () => { console.error(text) },
      stop: (finalText?: string) => { if (finalText) console.error(finalText) },
      update: () => {},
      succeed: (msg?: string) => { if (msg) console.error(`${symbols.success} ${msg}`) },
      fail: (msg?: string) => { if (msg) console.error(`${symbols.error} ${msg}`) }
    }
  }

  const { frames, interval: pace } = getSpinnerConfig(spinnerStyle)
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null
  let currentText = text

  const render = () => {
    const frame = frames[frameIndex % frames.length]
    process.stderr.write(`\r\x1b[K${frame} ${currentText}`)
    frameIndex++
  }

  const clear = () => {
    if (interval) clearInterval(interval)
    interval = null
    process.stderr.write(`\r\x1b[K`)
  }

  return {
    start: () => {
      render()
      interval = setInterval(render, pace)
    },
    stop: (finalText?: string) => {
      clear()
      if (finalText) console.error(finalText)
    },
    update: (newText: string) => {
      currentText = newText
    },
    succeed: (msg?: string) => {
      clear()
      console.error(`${symbols.success} ${msg || currentText}`)
    },
    fail: (msg?: string) => {
      clear()
      console.error(`${symbols.error} ${msg || currentText}`)
    }
  }
}

/**
 * Wrap an async operation with a spinner. The operation may update its text.
 */
export async function withSpinner<T>(
  text: string,
  operation: (spinner: Spinner) => Promise<T>,
  options: { successText?: string; failText?: string } = {}
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation(spinner)
    spinner.succeed(options.successText)
    return result
  } catch (err) {
    spinner.fail(options.failText)
    throw err
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Print a styled header (not in quiet mode)
 */
export function header(text: string): void {
  if (!quiet) {
    console.error(`\n${c.header(text)}\n${c.label('─'.repeat(text.length))}`)
  }
}
