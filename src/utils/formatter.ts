// File: src/utils/formatter.ts
// Table and JSON rendering of search results

import { Table } from 'console-table-printer'
import { ColumnSpec, OutputFormat, ResourceRow } from '../types'

export interface TableLayout {
  titles: string[]
  widths: number[]
  cells: string[][]
}

export interface RenderOptions {
  colors?: boolean
}

/**
 * Keep the verbose-only columns when asked to
 */
export function selectColumns<R extends ResourceRow>(columns: ColumnSpec<R>[], verbose = false): ColumnSpec<R>[] {
  return columns.filter((column) => verbose || !column.verbose)
}

/**
 * Compute cell strings and the width of every column
 *
 * A column is as wide as its longest cell or its title, whichever is longer.
 */
export function layoutTable<R extends ResourceRow>(columns: ColumnSpec<R>[], rows: R[]): TableLayout {
  const titles = columns.map((column) => column.title)
  const cells = rows.map((row) => columns.map((column) => column.value(row)))
  const widths = titles.map((title, index) => Math.max(title.length, ...cells.map((cell) => cell[index].length)))

  return { titles, widths, cells }
}

/**
 * Render rows as a boxed text table, in the order given
 */
export function renderTable<R extends ResourceRow>(
  columns: ColumnSpec<R>[],
  rows: R[],
  options: RenderOptions = {},
): string {
  const { widths, cells } = layoutTable(columns, rows)

  const table = new Table({
    columns: columns.map((column, index) => ({
      name: column.name,
      title: column.title,
      alignment: 'left' as const,
      // Fixed width: never wrap or truncate a cell
      minLen: widths[index],
      maxLen: widths[index],
    })),
    shouldDisableColors: !options.colors,
  })

  for (const cell of cells) {
    const record: Record<string, string> = {}
    columns.forEach((column, index) => {
      record[column.name] = cell[index]
    })
    table.addRow(record)
  }

  return table.render()
}

/**
 * Rows as plain objects keyed by column title
 */
export function toRecords<R extends ResourceRow>(columns: ColumnSpec<R>[], rows: R[]): Record<string, string>[] {
  const { titles, cells } = layoutTable(columns, rows)
  return cells.map((cell) => Object.fromEntries(titles.map((title, index) => [title, cell[index]])))
}

/**
 * Format search results in the requested output format
 */
export function formatOutput<R extends ResourceRow>(
  rows: R[],
  columns: ColumnSpec<R>[],
  format: OutputFormat = 'table',
  options: RenderOptions = {},
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toRecords(columns, rows), null, 2)

    case 'table':
      return renderTable(columns, rows, options)
  }
}
