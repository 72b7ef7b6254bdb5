// Full-area view of a running restore flow

import { Box, Text } from 'ink'
import type { RestoreFlow, RestoreStage } from '../../restore-flow.js'
import type { Area } from '../../types.js'
import { colors } from '../../utils/colors.js'
import { formatBytes } from '../../utils/format.js'

export function describeStage(stage: RestoreStage, label: string): string {
  switch (stage.kind) {
    case 'target':
      return `restore ${label} to:`
    case 'confirm':
      return `restore ${label} to ${stage.destination}? (y/n)`
    case 'restoring':
      return `restoring ${label} to ${stage.destination}...`
    case 'done': {
      const { files, dirs, symlinks, skipped, bytes } = stage.stats
      const skippedText = skipped > 0 ? `, skipped ${skipped}` : ''
      return `restored ${files} files, ${dirs} dirs, ${symlinks} symlinks (${formatBytes(bytes)})${skippedText} to ${stage.destination}`
    }
    case 'failed':
      return `restore of ${label} failed: ${stage.message}`
  }
}

function TargetInput({ value, cursor }: { value: string; cursor: number }) {
  const chars = Array.from(value)
  const before = chars.slice(0, cursor).join('')
  const at = chars[cursor] ?? ' '
  const after = chars.slice(cursor + 1).join('')
  return (
    <Text color={colors.fg}>
      {`> ${before}`}
      <Text inverse>{at}</Text>
      {after}
    </Text>
  )
}

export function RestoreView({ restore, area }: { restore: RestoreFlow; area: Area }) {
  const stage = restore.stage
  const color = stage.kind === 'failed' ? colors.red : stage.kind === 'done' ? colors.green : colors.fg
  const hint = stage.kind === 'target'
    ? '(Enter) continue | (Esc) abort | (Ctrl+U) clear'
    : stage.kind === 'done' || stage.kind === 'failed'
      ? 'press any key to return'
      : ''

  return (
    <Box flexDirection="column" width={area.width} height={area.height} borderStyle="round" borderColor={colors.orange}>
      <Text bold color={colors.purple}>{` restore ${restore.label}`}</Text>
      <Text color={color}>{describeStage(stage, restore.label)}</Text>
      {stage.kind === 'target' && <TargetInput value={restore.target.value} cursor={restore.target.cursor} />}
      <Box flexGrow={1} />
      <Text color={colors.comment}>{hint}</Text>
    </Box>
  )
}
