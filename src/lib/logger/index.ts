export type LogLevel = 'info' | 'warn' | 'error'

export interface LogEvent {
  ts: number
  type: string
  payload: Record<string, unknown>
  level: LogLevel
}

const MAX_BUFFER_SIZE = 5000

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 }

export const Logger = (() => {
  let buffer: LogEvent[] = []
  let consoleLevel: LogLevel | 'silent' = 'info'

  const add = (
    type: string,
    payload: Record<string, unknown> = {},
    level: LogLevel = 'info'
  ): void => {
    const e: LogEvent = {
      ts: Date.now(),
      type,
      payload,
      level,
    }

    buffer.push(e)

    if (buffer.length > MAX_BUFFER_SIZE) {
      buffer.shift()
    }

    if (consoleLevel !== 'silent' && LEVEL_RANK[level] >= LEVEL_RANK[consoleLevel]) {
      console[level](`[${type}]`, payload)
    }
  }

  const get = (): LogEvent[] => {
    return [...buffer]
  }

  const clear = (): void => {
    buffer = []
  }

  /**
   * Minimum level echoed to the console; the buffer always records everything
   */
  const setLevel = (level: LogLevel | 'silent'): void => {
    consoleLevel = level
  }

  return { add, get, clear, setLevel }
})()
