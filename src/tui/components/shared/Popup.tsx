// Modal popups drawn centered over the full area

import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import type { Area } from '../../types.js'
import type { PopupPrompt, PopupScrollableText, PopupText } from '../../widgets/popup.js'
import { colors } from '../../utils/colors.js'
import { padCell } from '../../utils/format.js'

// border plus one blank column on each side
const FRAME_WIDTH = 4

/** Outer width of a popup fitting `title` and `lines` inside `areaWidth` */
export function popupWidth(title: string, lines: readonly string[], areaWidth: number): number {
  const content = Math.max(title.length + 2, ...lines.map((line) => line.length))
  return Math.max(FRAME_WIDTH + 1, Math.min(content + FRAME_WIDTH, areaWidth))
}

/**
 * Pads every line to the inner width so the popup hides what is drawn
 * underneath it
 */
export function popupBodyLines(lines: readonly string[], width: number): string[] {
  const inner = Math.max(1, width - FRAME_WIDTH)
  return lines.map((line) => ` ${padCell(line, inner)} `)
}

interface PopupFrameProps {
  title: string
  lines: readonly string[]
  area: Area
  borderColor?: string
  children?: ReactNode
}

function PopupFrame({ title, lines, area, borderColor = colors.blue, children }: PopupFrameProps) {
  const width = popupWidth(title, lines, area.width)
  return (
    <Box
      position="absolute"
      width={area.width}
      height={area.height}
      alignItems="center"
      justifyContent="center"
    >
      <Box flexDirection="column" width={width} borderStyle="round" borderColor={borderColor}>
        <Text bold color={colors.purple}>{padCell(` ${title}`, width - 2)}</Text>
        {popupBodyLines(lines, width).map((line, index) => (
          <Text key={index} color={colors.fg}>{line}</Text>
        ))}
        {children}
      </Box>
    </Box>
  )
}

export function PopupTextView({ popup, area }: { popup: PopupText; area: Area }) {
  const lines = popup.lines.slice(0, Math.max(1, area.height - 3))
  return <PopupFrame title={popup.title} lines={lines} area={area} />
}

export function PopupPromptView({ popup, area }: { popup: PopupPrompt; area: Area }) {
  return <PopupFrame title={popup.title} lines={[popup.question]} area={area} borderColor={colors.orange} />
}

export function PopupScrollableTextView({ popup, area }: { popup: PopupScrollableText; area: Area }) {
  const visible = popup.visibleLines().slice(0, Math.max(1, area.height - 3))
  const last = Math.min(popup.scrollOffset + visible.length, popup.lines.length)
  const position = `${popup.scrollOffset + 1}-${last}/${popup.lines.length}`
  const width = popupWidth(popup.title, visible, area.width)
  return (
    <PopupFrame title={popup.title} lines={visible} area={area}>
      <Text color={colors.comment}>{padCell(` ${position}`, width - 2)}</Text>
    </PopupFrame>
  )
}
