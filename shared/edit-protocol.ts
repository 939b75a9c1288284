/**
 * Shared edit protocol vocabulary used by the server engine, the command
 * line client and the remote eval client.
 *
 * Client→Server: one request line of quoted arguments.
 * Server→Client: one notification per line, `-<name> [quoted payload]`.
 */
import { z } from 'zod'
import { quoteArgument, unquoteArgument } from './quoting.js'

/** Upper bound for one wire line, in UTF-8 bytes, including its newline. */
export const MAX_MESSAGE_BYTES = 1024

// ──────────────────────────────────────────────────────────────
// Client → Server
// ──────────────────────────────────────────────────────────────

export const RequestCommand = z.enum([
  '-auth',
  '-env',
  '-dir',
  '-current-frame',
  '-frame-parameters',
  '-nowait',
  '-display',
  '-parent-id',
  '-position',
  '-file',
  '-eval',
  '-window-system',
  '-tty',
  '-suspend',
  '-resume',
  '-ignore',
])

export type RequestCommand = z.infer<typeof RequestCommand>

/** Number of arguments each command consumes after itself. */
export const COMMAND_ARITY: Record<RequestCommand, number> = {
  '-auth': 1,
  '-env': 1,
  '-dir': 1,
  '-current-frame': 0,
  '-frame-parameters': 1,
  '-nowait': 0,
  '-display': 1,
  '-parent-id': 1,
  '-position': 1,
  '-file': 1,
  '-eval': 1,
  '-window-system': 0,
  '-tty': 2,
  '-suspend': 0,
  '-resume': 0,
  '-ignore': 1,
}

export type RequestArgument = { command: RequestCommand; args?: string[] }

/**
 * The `-auth <key>` prefix of a request to a TCP endpoint. The key is sent
 * unquoted: the server compares it byte for byte before decoding anything.
 */
export function encodeAuthPrefix(secret: string): string {
  return `-auth ${secret} `
}

/**
 * Encode commands as one newline-terminated request line. Every argument is
 * followed by a space, so an empty last argument still reaches the server.
 */
export function encodeRequestLine(items: RequestArgument[]): string {
  let line = ''
  for (const item of items) {
    line += `${item.command} `
    for (const arg of item.args ?? []) {
      line += `${quoteArgument(arg)} `
    }
  }
  return `${line}\n`
}

// ──────────────────────────────────────────────────────────────
// Server → Client
// ──────────────────────────────────────────────────────────────

export const ReplyCommand = z.enum([
  '-emacs-pid',
  '-window-system-unsupported',
  '-print',
  '-print-nonl',
  '-error',
])

export type ReplyCommand = z.infer<typeof ReplyCommand>

export type ServerReply =
  | { type: 'pid'; pid: number }
  | { type: 'window-system-unsupported' }
  | { type: 'print'; text: string; final: boolean }
  | { type: 'error'; message: string }
  | { type: 'unknown'; raw: string }

/**
 * Parse one reply line (without its newline). Print payloads are returned
 * still quoted: chunks must be concatenated before unquoting.
 */
export function parseReplyLine(line: string): ServerReply {
  const space = line.indexOf(' ')
  const head = space === -1 ? line : line.slice(0, space)
  const rest = space === -1 ? '' : line.slice(space + 1)
  const command = ReplyCommand.safeParse(head)
  if (!command.success) return { type: 'unknown', raw: line }

  switch (command.data) {
    case '-emacs-pid': {
      const pid = Number(rest.trim())
      if (!Number.isInteger(pid) || pid <= 0) return { type: 'unknown', raw: line }
      return { type: 'pid', pid }
    }
    case '-window-system-unsupported':
      return { type: 'window-system-unsupported' }
    case '-print':
      return { type: 'print', text: rest, final: true }
    case '-print-nonl':
      return { type: 'print', text: rest, final: false }
    case '-error':
      return { type: 'error', message: unquoteArgument(rest.trim()) }
  }
}

/**
 * Accumulates `-print` / `-print-nonl` chunks and yields the unquoted text
 * once a final `-print` arrives.
 */
export class PrintAssembler {
  private pending = ''

  push(reply: Extract<ServerReply, { type: 'print' }>): string | null {
    this.pending += reply.text
    if (!reply.final) return null
    const text = unquoteArgument(this.pending)
    this.pending = ''
    return text
  }

  /** Quoted text received without a terminating `-print`. */
  flush(): string | null {
    if (!this.pending) return null
    const text = unquoteArgument(this.pending)
    this.pending = ''
    return text
  }
}
