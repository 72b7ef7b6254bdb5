// Tokyo Night color palette and node type colors

import type { NodeType } from '../../repository/types.js'

export const colors = {
  bg: '#1a1b26',
  bgDark: '#16161e',
  bgHighlight: '#24283b',
  fg: '#c0caf5',
  fgDark: '#a9b1d6',
  blue: '#7aa2f7',
  cyan: '#7dcfff',
  purple: '#bb9af7',
  green: '#9ece6a',
  teal: '#73daca',
  red: '#f7768e',
  orange: '#e0af68',
  comment: '#565f89',
  darker: '#414868',
} as const

export function getNodeTypeColor(type: NodeType): string {
  switch (type) {
    case 'dir': return colors.blue
    case 'symlink': return colors.cyan
    case 'file': return colors.fg
    default: return colors.orange
  }
}
