// Snapshot browser: directory table, help footer, and the active overlay

import { Box, Text } from 'ink'
import type { SnapshotBrowser } from '../../snapshot-browser.js'
import { INFO_TEXT } from '../../snapshot-browser.js'
import type { Area } from '../../types.js'
import { colors, getNodeTypeColor } from '../../utils/colors.js'
import { PopupPromptView, PopupScrollableTextView, PopupTextView } from '../shared/Popup.js'
import { SelectTableView } from '../shared/SelectTableView.js'
import { RestoreView } from './RestoreView.js'

export interface BrowserViewProps {
  browser: SnapshotBrowser
  area: Area
}

function BrowserOverlay({ browser, area }: BrowserViewProps) {
  const screen = browser.currentScreen
  switch (screen.kind) {
    case 'help':
      return <PopupTextView popup={screen.popup} area={area} />
    case 'prompt-exit':
      return <PopupPromptView popup={screen.prompt} area={area} />
    case 'show-file':
      return <PopupScrollableTextView popup={screen.popup} area={area} />
    default:
      return null
  }
}

export function BrowserView({ browser, area }: BrowserViewProps) {
  const screen = browser.currentScreen
  if (screen.kind === 'restore') {
    return <RestoreView restore={screen.restore} area={area} />
  }

  const nodes = browser.currentTree.nodes
  const rowColor = (index: number) => {
    const node = nodes[index]
    return node ? getNodeTypeColor(node.type) : colors.fg
  }

  return (
    <Box flexDirection="column" width={area.width} height={area.height}>
      <Text bold color={colors.blue} wrap="truncate">{browser.title}</Text>
      <SelectTableView
        table={browser.table}
        width={area.width}
        height={Math.max(1, area.height - 3)}
        rowColor={rowColor}
        focused={screen.kind === 'browsing'}
      />
      <Text color={colors.fgDark} wrap="truncate">{browser.footer}</Text>
      <Text color={colors.comment} wrap="truncate">{INFO_TEXT}</Text>
      <BrowserOverlay browser={browser} area={area} />
    </Box>
  )
}
