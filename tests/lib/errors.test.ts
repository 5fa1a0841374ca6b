/**
 * Tests for errors.ts
 */

import { describe, it, expect } from 'vitest'
import {
  CatalogError,
  ConfigError,
  InvalidConfigError,
  ConflictingOptionsError,
  MissingSnapshotError,
  SourceError,
  SourceUnavailableError,
  UnsupportedSourceError,
  RecordError,
  MalformedOperationError,
  StorageError,
  HistoryWriteError,
  CommitWriteError,
  ExportWriteError,
  isCatalogError,
  isSourceError,
  isStorageError,
  formatErrorForCli,
  wrapError,
  toError
} from '../../src/lib/errors.js'

describe('errors', () => {
  describe('hierarchy', () => {
    it('should place every error under its category', () => {
      expect(new InvalidConfigError('bad')).toBeInstanceOf(ConfigError)
      expect(new ConflictingOptionsError(['--a', '--b'])).toBeInstanceOf(ConfigError)
      expect(new MissingSnapshotError('x.csv')).toBeInstanceOf(ConfigError)
      expect(new SourceUnavailableError('memory://catalog', 'down')).toBeInstanceOf(SourceError)
      expect(new UnsupportedSourceError('ftp://x')).toBeInstanceOf(SourceError)
      expect(new MalformedOperationError('badstring')).toBeInstanceOf(RecordError)
      expect(new HistoryWriteError('h.txt')).toBeInstanceOf(StorageError)
      expect(new CommitWriteError('s.csv')).toBeInstanceOf(StorageError)
      expect(new ExportWriteError('e.csv')).toBeInstanceOf(StorageError)
      expect(new ExportWriteError('e.csv')).toBeInstanceOf(CatalogError)
      expect(new ExportWriteError('e.csv')).toBeInstanceOf(Error)
    })

    it('should set name and code', () => {
      const error = new SourceUnavailableError('azure://sub-123', 'no provider operations returned')

      expect(error.name).toBe('SourceUnavailableError')
      expect(error.code).toBe('SOURCE_UNAVAILABLE')
      expect(error.message).toBe('Catalog source azure://sub-123 is unavailable: no provider operations returned')
      expect(error.context).toEqual({ source: 'azure://sub-123' })
    })

    it('should keep the cause', () => {
      const cause = new Error('EACCES')
      const error = new CommitWriteError('s.csv', cause)

      expect(error.cause).toBe(cause)
      expect(error.message).toBe('Failed to commit snapshot s.csv: EACCES')
    })
  })

  describe('messages', () => {
    it('should describe a malformed operation', () => {
      const error = new MalformedOperationError('badstring', 'Microsoft Compute')

      expect(error.message).toBe('Malformed operation "badstring" (Microsoft Compute): missing \'/\' separator')
      expect(error.operation).toBe('badstring')
      expect(error.code).toBe('MALFORMED_OPERATION')
    })

    it('should name the config file when known', () => {
      expect(new InvalidConfigError('bad', 'azcatalog.yaml').message).toBe('Invalid config in azcatalog.yaml: bad')
      expect(new InvalidConfigError('bad').message).toBe('Invalid config: bad')
    })

    it('should list conflicting options', () => {
      expect(new ConflictingOptionsError(['--services-only', '--features-only']).message).toBe(
        'Options cannot be combined: --services-only, --features-only'
      )
    })
  })

  describe('toCliOutput', () => {
    it('should include the suggestion', () => {
      const error = new UnsupportedSourceError('ftp://x')

      expect(error.toCliOutput()).toBe(
        'Error: Unsupported catalog source: ftp://x\n' +
          '  Suggestion: Use azure://<subscription-id>, file://<path> or a path to a .json dump'
      )
    })

    it('should omit a missing suggestion', () => {
      expect(new MalformedOperationError('x').toCliOutput()).toBe(
        'Error: Malformed operation "x": missing \'/\' separator'
      )
    })
  })

  describe('toJSON', () => {
    it('should serialize the structured fields', () => {
      const json = new MissingSnapshotError('prev.csv').toJSON()

      expect(json.name).toBe('MissingSnapshotError')
      expect(json.code).toBe('SNAPSHOT_NOT_FOUND')
      expect(json.message).toBe('Snapshot not found: prev.csv')
      expect(json.context).toEqual({ filePath: 'prev.csv' })
    })
  })

  describe('helpers', () => {
    it('should guard by category', () => {
      expect(isCatalogError(new HistoryWriteError('h.txt'))).toBe(true)
      expect(isCatalogError(new Error('plain'))).toBe(false)
      expect(isSourceError(new UnsupportedSourceError('x'))).toBe(true)
      expect(isSourceError(new HistoryWriteError('h.txt'))).toBe(false)
      expect(isStorageError(new HistoryWriteError('h.txt'))).toBe(true)
    })

    it('should format any thrown value', () => {
      expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
      expect(formatErrorForCli('text')).toBe('Error: text')
      expect(formatErrorForCli(new InvalidConfigError('bad'))).toBe(
        'Error: Invalid config: bad\n  Suggestion: Check your azcatalog.yaml syntax'
      )
    })

    it('should wrap foreign errors', () => {
      const plain = new Error('boom')
      const wrapped = wrapError(plain)

      expect(wrapped).toBeInstanceOf(CatalogError)
      expect(wrapped.code).toBe('UNKNOWN_ERROR')
      expect(wrapped.cause).toBe(plain)
      expect(wrapError('text', 'CUSTOM').code).toBe('CUSTOM')
    })

    it('should return catalog errors unchanged', () => {
      const error = new HistoryWriteError('h.txt')
      expect(wrapError(error)).toBe(error)
    })

    it('should normalize thrown values', () => {
      const error = new Error('x')
      expect(toError(error)).toBe(error)
      expect(toError(42).message).toBe('42')
    })
  })
})
