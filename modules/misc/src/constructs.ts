/**
 * Checks, at compile time, that all cases of a union type were handled. Place it after the last `if` that checks the
 * union: if a new case is ever added to the union, the call stops compiling.
 *
 *   type Verdict = 'OK' | 'FAIL'
 *
 *   function f(v: Verdict) {
 *     if (v === 'OK') {
 *       return 1
 *     }
 *     if (v === 'FAIL') {
 *       return 0
 *     }
 *     shouldNeverHappen(v)
 *   }
 *
 * @param n a value of type `never`
 */
export function shouldNeverHappen(n: never): never {
  // Never executed; here to make the compiler happy.
  throw new Error(`This should never happen ${n}`)
}

/**
 * An always-failing function, typically placed on the right-hand side of `??` or `||`:
 *
 *    const dir: string = process.env['WORKING_DIR'] || failMe('missing env variable "WORKING_DIR"')
 *
 * @param hint an optional human-readable string to be placed in the message of the thrown error
 */
export function failMe(hint?: string): never {
  if (!hint) {
    throw new Error(`This expression must never be evaluated`)
  }

  throw new Error(`Bad value: ${hint}`)
}

/**
 * Safely converts an input of type `unknown` into an Error-like object. Each of `name`, `message` and `stack` is a
 * string if the input carries a string property by that name, and undefined otherwise.
 */
export function errorLike(err: unknown): {
  name: string | undefined
  message: string | undefined
  stack: string | undefined
} {
  if (typeof err !== 'object' || err === null) {
    return { name: undefined, message: undefined, stack: undefined }
  }
  const name: unknown = Reflect.get(err, 'name')
  const message: unknown = Reflect.get(err, 'message')
  const stack: unknown = Reflect.get(err, 'stack')
  return {
    name: typeof name === 'string' ? name : undefined,
    message: typeof message === 'string' ? message : undefined,
    stack: typeof stack === 'string' ? stack : undefined,
  }
}

/**
 * Returns the most detailed text available for a thrown value: its stack trace (which already starts with
 * "<name>: <message>"), its message, or, for values that are not errors, their string form.
 */
export function formatTrace(err: unknown): string {
  const { stack, message } = errorLike(err)
  return stack ?? message ?? String(err)
}
