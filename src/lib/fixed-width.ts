/**
 * Fixed-width text tables
 *
 * Layout:
 *   Header1      Header2      Header3
 *   -------      -------      -------
 *   value        value        value
 *
 * Every column but the last is padded to its width. A cell that reaches the
 * width is followed by a single space instead. Lines never end in whitespace.
 */

export interface FixedWidthColumn {
  header: string
  /** Omit for the last column, which takes the remainder */
  width?: number
}

function renderLine(columns: readonly FixedWidthColumn[], cells: readonly string[]): string {
  let line = ''
  columns.forEach((column, index) => {
    const cell = cells[index] ?? ''
    const isLast = index === columns.length - 1
    if (isLast || column.width === undefined) {
      line += cell
    } else {
      line += cell.length >= column.width ? `${cell} ` : cell.padEnd(column.width)
    }
  })
  return line.trimEnd()
}

/**
 * Render a table as lines of text (header, underline, rows)
 */
export function formatFixedWidth(
  columns: readonly FixedWidthColumn[],
  rows: readonly (readonly string[])[]
): string[] {
  const header = renderLine(columns, columns.map(c => c.header))
  const underline = renderLine(columns, columns.map(c => '-'.repeat(c.header.length)))
  return [header, underline, ...rows.map(row => renderLine(columns, row.map(cell => cell.replace(/\r?\n/g, ' '))))]
}
