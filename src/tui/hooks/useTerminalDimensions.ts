import { useEffect, useState } from 'react'
import { useStdout } from 'ink'
import type { Area } from '../types.js'

const FALLBACK: Area = { width: 80, height: 24 }

export function useTerminalDimensions(): Area {
  const { stdout } = useStdout()
  const read = (): Area => ({
    width: stdout.columns || FALLBACK.width,
    height: stdout.rows || FALLBACK.height,
  })
  const [area, setArea] = useState<Area>(read)

  useEffect(() => {
    const onResize = () => setArea(read())
    stdout.on('resize', onResize)
    return () => {
      stdout.off('resize', onResize)
    }
  }, [stdout])

  return area
}
