import { MAX_MESSAGE_BYTES } from '../shared/edit-protocol.js'
import { quoteArgument, trailingAmpersandRun } from '../shared/quoting.js'

const PRINT_PREFIX = '-print '
const PRINT_NONL_PREFIX = '-print-nonl '

export const WINDOW_SYSTEM_UNSUPPORTED_LINE = '-window-system-unsupported \n'

export function formatPidLine(pid: number): string {
  return `-emacs-pid ${pid}\n`
}

export function formatErrorLine(message: string): string {
  return `-error ${quoteArgument(message)}\n`
}

function utf8Size(codePoint: number): number {
  if (codePoint < 0x80) return 1
  if (codePoint < 0x800) return 2
  if (codePoint < 0x10000) return 3
  return 4
}

/**
 * Index up to which `text` fits in `budget` UTF-8 bytes, never splitting a
 * surrogate pair.
 */
function fitPrefix(text: string, budget: number): number {
  let bytes = 0
  let i = 0
  while (i < text.length) {
    const cp = text.codePointAt(i) ?? 0
    const size = utf8Size(cp)
    if (bytes + size > budget) break
    bytes += size
    i += cp > 0xffff ? 2 : 1
  }
  return i
}

/**
 * Frame `text` as `-print` reply lines. Text whose line would exceed
 * `maxBytes` (UTF-8, newline included) is split into `-print-nonl` chunks with
 * a final `-print`. A chunk never ends inside an `&` escape pair.
 */
export function framePrint(text: string, maxBytes: number = MAX_MESSAGE_BYTES): string[] {
  const chunkBudget = maxBytes - Buffer.byteLength(PRINT_NONL_PREFIX) - 1
  if (!Number.isFinite(maxBytes) || chunkBudget < 4) {
    throw new Error(`Max message size ${maxBytes} is too small for a -print-nonl chunk`)
  }

  const lines: string[] = []
  let remaining = quoteArgument(text)
  const finalOverhead = Buffer.byteLength(PRINT_PREFIX) + 1

  while (finalOverhead + Buffer.byteLength(remaining) > maxBytes) {
    let end = fitPrefix(remaining, chunkBudget)
    if (trailingAmpersandRun(remaining.slice(0, end)) % 2 === 1) {
      end -= 1
    }
    if (end <= 0) {
      throw new Error('Unable to advance reply chunk within max message size')
    }
    lines.push(`${PRINT_NONL_PREFIX}${remaining.slice(0, end)}\n`)
    remaining = remaining.slice(end)
  }

  lines.push(`${PRINT_PREFIX}${remaining}\n`)
  return lines
}
