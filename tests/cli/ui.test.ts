/**
 * Tests for the CLI output helpers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { getSpinnerConfig } from 'tuiuiu.js'

describe('ui', () => {
  const originalIsTTY = process.stderr.isTTY

  beforeEach(() => {
    vi.resetModules()
  })

  afterEach(() => {
    process.stderr.isTTY = originalIsTTY
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('createSpinner', () => {
    it('should draw the tuiuiu.js dots frames on a terminal', async () => {
      process.stderr.isTTY = true
      vi.useFakeTimers()
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
      vi.spyOn(console, 'error').mockImplementation(() => {})
      const ui = await import('../../src/cli/ui.js')
      const { frames, interval } = getSpinnerConfig('dots')

      const spinner = ui.createSpinner('Listing provider operations')
      spinner.start()
      vi.advanceTimersByTime(interval)
      spinner.stop()

      expect(write).toHaveBeenNthCalledWith(1, `\r\x1b[K${frames[0]} Listing provider operations`)
      expect(write).toHaveBeenNthCalledWith(2, `\r\x1b[K${frames[1 % frames.length]} Listing provider operations`)
    })

    it('should print plain lines when stderr is not a terminal', async () => {
      process.stderr.isTTY = false
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {})
      const ui = await import('../../src/cli/ui.js')

      const spinner = ui.createSpinner('Reading catalog')
      spinner.start()
      spinner.update('ignored')
      spinner.stop('Finished')

      expect(errors.mock.calls).toEqual([['Reading catalog'], ['Finished']])
    })
  })

  describe('withSpinner', () => {
    it('should return the result and stay silent when quiet', async () => {
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {})
      const ui = await import('../../src/cli/ui.js')
      ui.setQuiet(true)

      const result = await ui.withSpinner('Working', async spinner => {
        spinner.update('Still working')
        return 42
      })

      expect(result).toBe(42)
      expect(errors).not.toHaveBeenCalled()
    })

    it('should rethrow the operation error', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      const ui = await import('../../src/cli/ui.js')
      ui.setQuiet(true)
      const failure = new Error('listing failed')

      await expect(ui.withSpinner('Working', () => Promise.reject(failure))).rejects.toBe(failure)
    })
  })

  describe('labeled', () => {
    it('should keep the label and value text with colors disabled', async () => {
      vi.stubEnv('NO_COLOR', '1')
      const { labeled } = await import('../../src/cli/lib/colors.js')

      expect(labeled('Source', 'memory://catalog')).toBe('Source: memory://catalog')
      vi.unstubAllEnvs()
    })
  })
})
