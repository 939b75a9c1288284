import net from 'net'
import { StringDecoder } from 'string_decoder'
import type { ZodType, ZodTypeDef } from 'zod'
import { encodeAuthPrefix, encodeRequestLine, parseReplyLine, PrintAssembler, type ServerReply } from '../shared/edit-protocol.js'
import { RemoteEvalError, ServerUnreachable, UnreadableResult } from './errors.js'
import { logger } from './logger.js'
import { describeEndpoint, endpointRequiresAuth, locateServer, type LocateOptions, type RendezvousEndpoint } from './rendezvous.js'

const log = logger.child({ component: 'remote-eval' })

export const DEFAULT_REMOTE_EVAL_TIMEOUT_MS = 30_000

/** Open a connection to a server endpoint. Rejects with `ServerUnreachable`. */
export function connectToEndpoint(endpoint: RendezvousEndpoint, timeoutMs?: number): Promise<net.Socket> {
  const target = describeEndpoint(endpoint)
  return new Promise((resolve, reject) => {
    const socket = endpoint.kind === 'local'
      ? net.createConnection({ path: endpoint.path })
      : net.createConnection({ host: endpoint.host, port: endpoint.port })
    const timer = timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
        socket.destroy()
        reject(new ServerUnreachable(target, new Error(`connect timed out after ${timeoutMs}ms`)))
      }, timeoutMs)
    socket.once('connect', () => {
      clearTimeout(timer)
      socket.off('error', onError)
      resolve(socket)
    })
    const onError = (err: Error) => {
      clearTimeout(timer)
      reject(new ServerUnreachable(target, err))
    }
    socket.once('error', onError)
  })
}

/**
 * Feed every reply line the server sends to `onReply` until the connection
 * closes. Resolves on close; a socket error rejects.
 */
export function readReplies(socket: net.Socket, onReply: (reply: ServerReply) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    const decoder = new StringDecoder('utf8')
    let buffer = ''
    let failed: Error | undefined

    const drainLines = () => {
      let newline = buffer.indexOf('\n')
      while (newline !== -1) {
        onReply(parseReplyLine(buffer.slice(0, newline)))
        buffer = buffer.slice(newline + 1)
        newline = buffer.indexOf('\n')
      }
    }

    socket.on('data', (chunk: Buffer) => {
      buffer += decoder.write(chunk)
      try {
        drainLines()
      } catch (err) {
        failed = err instanceof Error ? err : new Error(String(err))
        socket.destroy()
      }
    })
    socket.once('error', (err) => {
      failed = failed ?? err
    })
    socket.once('close', () => {
      buffer += decoder.end()
      if (buffer) {
        log.debug({ event: 'reply_truncated', bytes: buffer.length }, 'Connection closed mid-line')
      }
      if (failed) reject(failed)
      else resolve()
    })
  })
}

/** Read the printed form of a value back. Literals are JSON. */
export function parseLiteral(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new UnreadableResult(text, err)
  }
}

export type RemoteEvalOptions = {
  /** Overall deadline, from connect to close. */
  timeoutMs?: number
}

/**
 * Evaluates expressions on another running server, as a client of it. Each
 * call is one connection carrying one `-eval` request.
 */
export class RemoteEvalClient {
  constructor(private endpoint: RendezvousEndpoint, private options: RemoteEvalOptions = {}) {}

  /** Resolve a server by name the way the command line client does. */
  static async locate(locate: LocateOptions, options: RemoteEvalOptions = {}): Promise<RemoteEvalClient> {
    return new RemoteEvalClient(await locateServer(locate), options)
  }

  /** The raw printed text of the result, unquoted and reassembled. */
  async evaluateText(expression: string): Promise<string> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_REMOTE_EVAL_TIMEOUT_MS
    const socket = await connectToEndpoint(this.endpoint, timeoutMs)
    const target = describeEndpoint(this.endpoint)

    const deadline = setTimeout(() => {
      socket.destroy(new ServerUnreachable(target, new Error(`no reply within ${timeoutMs}ms`)))
    }, timeoutMs)

    const assembler = new PrintAssembler()
    const printed: string[] = []
    let remoteError: string | undefined

    const replies = readReplies(socket, (reply) => {
      switch (reply.type) {
        case 'print': {
          const text = assembler.push(reply)
          if (text !== null) printed.push(text)
          return
        }
        case 'error':
          remoteError = remoteError ?? reply.message
          return
        case 'unknown':
          log.debug({ event: 'reply_ignored', line: reply.raw }, 'Ignoring unexpected reply')
          return
        default:
          return
      }
    })

    const request = encodeRequestLine([{ command: '-eval', args: [expression] }])
    socket.write(endpointRequiresAuth(this.endpoint) ? `${encodeAuthPrefix(this.endpoint.secret)}${request}` : request)

    try {
      await replies
    } finally {
      clearTimeout(deadline)
    }

    if (remoteError !== undefined) throw new RemoteEvalError(remoteError)
    const trailing = assembler.flush()
    if (trailing !== null) printed.push(trailing)
    log.debug({ event: 'remote_eval_done', endpoint: target, bytes: printed.join('').length }, 'Remote evaluation finished')
    return printed.join('')
  }

  /** Evaluate and read the result back, optionally validated against `schema`. */
  async evaluate(expression: string): Promise<unknown>
  async evaluate<T>(expression: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T>
  async evaluate<T>(expression: string, schema?: ZodType<T, ZodTypeDef, unknown>): Promise<unknown> {
    const text = await this.evaluateText(expression)
    const value = parseLiteral(text)
    if (!schema) return value
    const parsed = schema.safeParse(value)
    if (!parsed.success) {
      throw new UnreadableResult(text, parsed.error)
    }
    return parsed.data
  }
}
