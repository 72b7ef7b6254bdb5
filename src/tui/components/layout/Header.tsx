// Header showing the app name, the current title and the active mode

import { Box, Text } from 'ink'
import { colors } from '../../utils/colors.js'

export interface HeaderProps {
  title: string
  mode: string
}

export function Header({ title, mode }: HeaderProps) {
  return (
    <Box width="100%" flexDirection="row" justifyContent="space-between" paddingLeft={1} paddingRight={1}>
      <Text bold color={colors.blue}>snaptree</Text>
      <Box flexDirection="row" gap={2}>
        <Text color={colors.fg}>{title}</Text>
        <Text color={getModeColor(mode)}>{`[${mode}]`}</Text>
      </Box>
    </Box>
  )
}

export function getModeColor(mode: string): string {
  switch (mode) {
    case 'browsing': return colors.green
    case 'list': return colors.teal
    case 'restore': return colors.orange
    case 'prompt-exit': return colors.red
    default: return colors.comment
  }
}
