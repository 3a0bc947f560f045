import { TaskParams } from 'dag-protocol'
import { Jsonable } from 'misc'

/**
 * Turns `key=value` strings into task parameters. A value that parses as JSON is taken as that JSON value, anything
 * else is kept as a string: `n=5` is a number, `s=abc` a string and `s='"5"'` the string "5". A later occurrence of a
 * key overrides an earlier one.
 */
export function parseParams(pairs: readonly string[]): TaskParams {
  const ret: Record<string, Jsonable> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf('=')
    if (eq <= 0) {
      throw new Error(`Bad parameter: "${pair}" (expected key=value)`)
    }
    ret[pair.slice(0, eq)] = parseValue(pair.slice(eq + 1))
  }
  return ret
}

function parseValue(raw: string): Jsonable {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (e) {
    return raw
  }
  return Jsonable.parse(parsed)
}
