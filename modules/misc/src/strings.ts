/**
 * Sanitizes a string such that it can be used as a file name.
 */
export function toReasonableFileName(input: string) {
  return input
    .split('')
    .map(c => (c.match(ALLOWED_FILE_NAME_SYMBOLS) ? c : '_'))
    .join('')
}
const ALLOWED_FILE_NAME_SYMBOLS = /[a-zA-Z0-9_-]/

/**
 * Centers `title` inside a line of `fill` characters that is `width` characters wide. A title too long to fit still
 * gets one fill character on each side.
 *
 *    banner('ab', 10) === '--- ab ---'
 */
export function banner(title: string, width = 80, fill = '-') {
  const padding = Math.max(width - title.length - 2, 2)
  const left = Math.floor(padding / 2)
  return `${fill.repeat(left)} ${title} ${fill.repeat(padding - left)}`
}
