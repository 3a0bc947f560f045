import { format } from 'logform'
import jsonStringify from 'safe-stable-stringify'

export const LEVELS = ['error', 'info', 'debug'] as const
export type Level = (typeof LEVELS)[number]

export const levelValues: Record<Level, number> = {
  error: 0,
  info: 1,
  debug: 2,
}

const joinTokens = (...tokens: unknown[]) =>
  tokens
    .map(t => (typeof t === 'string' ? t.trim() : undefined))
    .filter(Boolean)
    .join(' ')

/**
 * `<timestamp> [<level>] <message> <metadata as JSON> <stack>`
 */
export const fileLineFormat = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format.printf(info => {
    let stringifiedRest: string | undefined = jsonStringify(
      Object.assign({}, info, {
        level: undefined,
        message: undefined,
        timestamp: undefined,
        stack: undefined,
        ui: undefined,
      }),
    )
    if (stringifiedRest === '{}') {
      stringifiedRest = ''
    }

    return joinTokens(info.timestamp, `[${info.level}]`, info.message, stringifiedRest, info.stack)
  }),
)

const filterUi = format(info => {
  if (!info.ui) {
    return false
  }

  return info
})

/**
 * Only entries marked as "UI", rendered as `<message> <stack>`.
 */
export const uiLineFormat = format.combine(
  format.errors({ stack: true }),
  filterUi(),
  format.printf(info => joinTokens(info.message, info.stack)),
)
