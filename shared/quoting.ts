/**
 * Argument quoting for the line protocol.
 *
 * Requests are newline-delimited and arguments are space-delimited, so an
 * argument on the wire never contains a literal space or newline:
 *
 *   space   -> &_
 *   newline -> &n
 *   &       -> &&
 *   leading - -> &-   (an argument may not start with the flag marker)
 */

export type UnquoteWarning = {
  /** Character that followed `&` and is not a known escape. */
  escape: string
  index: number
}

export function quoteArgument(value: string): string {
  let out = ''
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i]
    switch (ch) {
      case '&':
        out += '&&'
        break
      case ' ':
        out += '&_'
        break
      case '\n':
        out += '&n'
        break
      case '-':
        out += i === 0 ? '&-' : '-'
        break
      default:
        out += ch
    }
  }
  return out
}

/**
 * Reverse {@link quoteArgument}. `&-` is accepted anywhere, not only at the
 * start. An unknown escape decodes to a single space; `onUnknownEscape` is
 * told about it. A trailing lone `&` is dropped.
 */
export function unquoteArgument(value: string, onUnknownEscape?: (warning: UnquoteWarning) => void): string {
  if (!value.includes('&')) return value
  let out = ''
  let i = 0
  while (i < value.length) {
    const ch = value[i]
    if (ch !== '&') {
      out += ch
      i += 1
      continue
    }
    const next = value[i + 1]
    if (next === undefined) break
    switch (next) {
      case '&':
        out += '&'
        break
      case '-':
        out += '-'
        break
      case 'n':
        out += '\n'
        break
      case '_':
        out += ' '
        break
      default:
        onUnknownEscape?.({ escape: next, index: i })
        out += ' '
    }
    i += 2
  }
  return out
}

/**
 * Split a request line into its raw (still quoted) arguments. An empty
 * argument between two spaces is kept; only the empty part after a trailing
 * space is dropped.
 */
export function splitArguments(line: string): string[] {
  if (line === '') return []
  const parts = line.split(' ')
  if (parts[parts.length - 1] === '') parts.pop()
  return parts
}

/** Length of the run of `&` characters that ends `text` exactly. */
export function trailingAmpersandRun(text: string): number {
  let count = 0
  for (let i = text.length - 1; i >= 0 && text[i] === '&'; i -= 1) {
    count += 1
  }
  return count
}
