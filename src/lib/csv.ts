/**
 * Delimited Text Codec
 *
 * Comma-separated values with double-quote quoting.
 *
 * Writing: every field is quoted, embedded quotes are doubled, rows end in \n.
 *
 * Parsing:
 *   - quoted and bare fields
 *   - "" inside a quoted field is a literal quote
 *   - newlines inside quoted fields
 *   - \n and \r\n row endings
 *   - a leading UTF-8 BOM
 *   - blank lines are skipped
 */

// =============================================================================
// Types
// =============================================================================

export interface CsvParseResult {
  rows: string[][]
  /** Set when the input could not be read to the end */
  error?: string
}

// =============================================================================
// Writing
// =============================================================================

export function quoteField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(quoteField).join(',')
}

/**
 * Serialize a header plus rows
 */
export function formatCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map(formatCsvRow).join('\n') + '\n'
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse CSV text into rows of fields.
 *
 * On an unterminated quoted field the rows completed before it are returned
 * together with an error message.
 */
export function parseCsv(content: string): CsvParseResult {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content
  const rows: string[][] = []

  let row: string[] = []
  let field = ''
  let inQuotes = false
  let quoteStartLine = 0
  let line = 1
  let rowHasContent = false

  const endField = () => {
    row.push(field)
    field = ''
  }

  const endRow = () => {
    endField()
    if (rowHasContent) {
      rows.push(row)
    }
    row = []
    rowHasContent = false
  }

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        if (char === '\n') line++
        field += char
      }
      continue
    }

    switch (char) {
      case '"':
        inQuotes = true
        quoteStartLine = line
        rowHasContent = true
        break
      case ',':
        endField()
        rowHasContent = true
        break
      case '\r':
        if (text[i + 1] === '\n') break
        field += char
        rowHasContent = true
        break
      case '\n':
        endRow()
        line++
        break
      default:
        field += char
        rowHasContent = true
    }
  }

  if (inQuotes) {
    return { rows, error: `Unterminated quoted field starting on line ${quoteStartLine}` }
  }

  endRow()
  return { rows }
}
