// Table with a highlighted selection that keeps the selected row in view

import { Box, Text } from 'ink'
import type { Row, SelectTable } from '../../widgets/select-table.js'
import { getVisibleWindow } from '../../widgets/select-table.js'
import { colors } from '../../utils/colors.js'
import { padCell } from '../../utils/format.js'

const COLUMN_GAP = 2

/**
 * Width of every column: all but the first take their widest cell, the first
 * gets whatever is left of `totalWidth` (at least its header)
 */
export function computeColumnWidths(header: Row, rows: readonly Row[], totalWidth: number): number[] {
  const widths = header.map((cell) => cell.length)
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length)
    })
  }
  const rest = widths.slice(1).reduce((sum, width) => sum + width + COLUMN_GAP, 0)
  const firstHeader = header[0] ?? ''
  widths[0] = Math.max(firstHeader.length, Math.min(widths[0] ?? 0, totalWidth - rest))
  return widths
}

export function formatRow(row: Row, widths: number[]): string {
  return widths
    .map((width, index) => padCell(row[index] ?? '', width))
    .join(' '.repeat(COLUMN_GAP))
}

export interface SelectTableViewProps {
  table: SelectTable
  width: number
  height: number
  /** Optional color per data row */
  rowColor?: (index: number) => string
  focused?: boolean
}

export function SelectTableView({ table, width, height, rowColor, focused = true }: SelectTableViewProps) {
  const rows = table.content
  const selected = table.selected()
  const widths = computeColumnWidths(table.header, rows, width)
  const bodyHeight = Math.max(0, height - 1)
  const { start, end } = getVisibleWindow(rows.length, selected, bodyHeight)

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Text bold color={colors.purple} wrap="truncate">
        {formatRow(table.header, widths)}
      </Text>
      {rows.slice(start, end).map((row, offset) => {
        const index = start + offset
        const isSelected = focused && index === selected
        return (
          <Text
            key={index}
            wrap="truncate"
            inverse={isSelected}
            color={rowColor ? rowColor(index) : colors.fg}
          >
            {formatRow(row, widths)}
          </Text>
        )
      })}
    </Box>
  )
}
