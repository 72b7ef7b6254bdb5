import { Box, Text } from 'ink'
import { colors } from '../../utils/colors.js'

export interface StatusBarProps {
  repoPath: string
  progress: string | null
  error: string | null
}

export function StatusBar({ repoPath, progress, error }: StatusBarProps) {
  const errorLabel = error?.startsWith('Error: ') ? error : (error ? `Error: ${error}` : null)

  return (
    <Box width="100%" flexDirection="row" justifyContent="space-between" paddingLeft={1} paddingRight={1}>
      <Box flexDirection="row" gap={2}>
        <Text color={colors.comment}>{repoPath}</Text>
        {progress && <Text color={colors.cyan}>{progress}</Text>}
        {errorLabel && <Text color={colors.red}>{errorLabel}</Text>}
      </Box>
      <Text color={colors.comment}>Ctrl+C:quit</Text>
    </Box>
  )
}
