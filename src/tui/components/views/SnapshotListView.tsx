import { Box, Text } from 'ink'
import { LIST_INFO_TEXT, type SnapshotList } from '../../snapshot-list.js'
import type { Area } from '../../types.js'
import { colors } from '../../utils/colors.js'
import { PopupPromptView } from '../shared/Popup.js'
import { SelectTableView } from '../shared/SelectTableView.js'
import { BrowserView } from './BrowserView.js'

export interface SnapshotListViewProps {
  list: SnapshotList
  area: Area
}

export function SnapshotListView({ list, area }: SnapshotListViewProps) {
  const screen = list.currentScreen
  if (screen.kind === 'browser') {
    return <BrowserView browser={screen.browser} area={area} />
  }

  return (
    <Box flexDirection="column" width={area.width} height={area.height}>
      <Text bold color={colors.blue} wrap="truncate">{list.title}</Text>
      {list.snapshots.length === 0 ? (
        <Box flexGrow={1}>
          <Text color={colors.comment}>no snapshots in this repository</Text>
        </Box>
      ) : (
        <SelectTableView table={list.table} width={area.width} height={Math.max(1, area.height - 2)} />
      )}
      <Text color={colors.comment} wrap="truncate">{LIST_INFO_TEXT}</Text>
      {screen.kind === 'prompt-exit' && <PopupPromptView popup={screen.prompt} area={area} />}
    </Box>
  )
}
