/**
 * Tests for csv.ts
 */

import { describe, it, expect } from 'vitest'
import { formatCsv, formatCsvRow, parseCsv, quoteField } from '../../src/lib/csv.js'

describe('csv', () => {
  describe('writing', () => {
    it('should quote every field and double embedded quotes', () => {
      expect(quoteField('plain')).toBe('"plain"')
      expect(quoteField('say "hi"')).toBe('"say ""hi"""')
      expect(formatCsvRow(['a', '', 'b,c'])).toBe('"a","","b,c"')
    })

    it('should end every row with a newline', () => {
      expect(formatCsv(['A', 'B'], [['1', '2'], ['3', '4']])).toBe('"A","B"\n"1","2"\n"3","4"\n')
    })

    it('should write just the header for no rows', () => {
      expect(formatCsv(['A'], [])).toBe('"A"\n')
    })
  })

  describe('parseCsv', () => {
    it('should read back awkward values', () => {
      const content = formatCsv(['a', 'b'], [['x,y', 'say "hi"'], ['line1\nline2', '']])

      expect(parseCsv(content)).toEqual({
        rows: [['a', 'b'], ['x,y', 'say "hi"'], ['line1\nline2', '']]
      })
    })

    it('should read bare fields and CRLF line endings', () => {
      expect(parseCsv('a,b\r\n1,2\r\n').rows).toEqual([['a', 'b'], ['1', '2']])
    })

    it('should strip a leading byte order mark', () => {
      expect(parseCsv('\uFEFFa\n1\n').rows).toEqual([['a'], ['1']])
    })

    it('should skip blank lines', () => {
      expect(parseCsv('a\n\n1\n\n').rows).toEqual([['a'], ['1']])
    })

    it('should keep empty fields', () => {
      expect(parseCsv('"",x,\n').rows).toEqual([['', 'x', '']])
    })

    it('should read a last row without a trailing newline', () => {
      expect(parseCsv('a,b\n1,2').rows).toEqual([['a', 'b'], ['1', '2']])
    })

    it('should return nothing for empty input', () => {
      expect(parseCsv('')).toEqual({ rows: [] })
    })

    it('should report an unterminated quote with the rows read before it', () => {
      expect(parseCsv('a,b\n"oops,1\n')).toEqual({
        rows: [['a', 'b']],
        error: 'Unterminated quoted field starting on line 2'
      })
    })
  })
})
