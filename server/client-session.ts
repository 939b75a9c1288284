import { StringDecoder } from 'string_decoder'
import { nanoid } from 'nanoid'
import { logger } from './logger.js'
import { describeEndpoint, type RendezvousEndpoint } from './rendezvous.js'
import type { DocumentHandle, SessionContext, SurfaceHandle } from './editor-host.js'
import type { EnvironmentEntry } from './request-parser.js'

const log = logger.child({ component: 'client-session' })

/** The part of a socket a session needs. `net.Socket` satisfies it. */
export interface SessionConnection {
  readonly destroyed: boolean
  readonly writable: boolean
  write(data: string, callback?: (err?: Error | null) => void): boolean
  end(callback?: () => void): unknown
  destroy(error?: Error): unknown
}

export type SessionStatus = 'open' | 'closing' | 'closed'

export type Continuation = () => Promise<void>

export type ClientSessionOptions = {
  connection: SessionConnection
  endpoint: RendezvousEndpoint
  authenticated: boolean
  connectionId?: string
  remoteAddress?: string
}

export class ClientSession {
  readonly id = `client_${nanoid(10)}`
  readonly connectionId: string
  readonly connection: SessionConnection
  readonly endpoint: RendezvousEndpoint
  readonly remoteAddress?: string
  readonly connectedAt = Date.now()

  authenticated: boolean
  authAttempted = false
  status: SessionStatus = 'open'

  readonly environment: EnvironmentEntry[] = []
  directory?: string
  readonly documents = new Set<DocumentHandle>()
  displaySurface?: SurfaceHandle
  /** Whether `displaySurface` was created for this session (and is released with it). */
  ownsSurface = false

  /** A request is executing; later lines wait. */
  busy = false
  /** A read arrived while a request was running or armed; process one more line when idle. */
  readPending = false

  private pendingInput = ''
  private readonly decoder = new StringDecoder('utf8')
  private continuation: Continuation | null = null
  private active: Promise<void> | null = null

  constructor(options: ClientSessionOptions) {
    this.connection = options.connection
    this.endpoint = options.endpoint
    this.authenticated = options.authenticated
    this.connectionId = options.connectionId ?? nanoid()
    this.remoteAddress = options.remoteAddress
  }

  get isOpen(): boolean {
    return this.status === 'open' && !this.connection.destroyed
  }

  get endpointName(): string {
    return describeEndpoint(this.endpoint)
  }

  /** Append raw bytes; multi-byte characters split across reads are kept intact. */
  appendInput(chunk: Buffer | string): void {
    this.pendingInput += typeof chunk === 'string' ? chunk : this.decoder.write(chunk)
  }

  /**
   * Remove and return the first complete line (without its newline). Anything
   * after it stays buffered as the start of the next request.
   */
  takeLine(): string | null {
    const newline = this.pendingInput.indexOf('\n')
    if (newline === -1) return null
    const line = this.pendingInput.slice(0, newline)
    this.pendingInput = this.pendingInput.slice(newline + 1)
    return line.endsWith('\r') ? line.slice(0, -1) : line
  }

  get bufferedInput(): string {
    return this.pendingInput
  }

  /**
   * Write wire text. Returns false when the connection is already gone, which
   * is how a mid-request disconnect is noticed.
   */
  send(text: string): boolean {
    if (this.connection.destroyed || !this.connection.writable) return false
    try {
      this.connection.write(text, (err) => {
        if (err) log.debug({ err, sessionId: this.id }, 'Write to client failed')
      })
      return true
    } catch (err) {
      log.debug({ err, sessionId: this.id }, 'Write to client threw')
      return false
    }
  }

  sendAll(lines: readonly string[]): boolean {
    for (const line of lines) {
      if (!this.send(line)) return false
    }
    return true
  }

  addEnvironment(entries: readonly EnvironmentEntry[]): void {
    for (const entry of entries) this.environment.push({ ...entry })
  }

  context(noWait: boolean): SessionContext {
    return {
      sessionId: this.id,
      environment: this.environment,
      directory: this.directory,
      surface: this.displaySurface,
      noWait,
    }
  }

  /** Whether a request line or a continuation is running for this session. */
  get inFlight(): boolean {
    return this.active !== null
  }

  /**
   * Run `task` as the session's only request in flight. Request lines and
   * continuations both go through here; a caller waits for the running one.
   */
  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    while (this.active) await this.active
    const running = (async () => {
      try {
        return await task()
      } finally {
        this.active = null
      }
    })()
    this.active = running.then(
      () => undefined,
      () => undefined,
    )
    return running
  }

  get hasContinuation(): boolean {
    return this.continuation !== null
  }

  /** Store the single deferred action. Arming twice is a programming error. */
  armContinuation(action: Continuation): void {
    if (this.continuation) {
      throw new Error(`Session ${this.id} already has a pending continuation`)
    }
    this.continuation = action
  }

  /** Take the pending action out of its slot, so it can run at most once. */
  takeContinuation(): Continuation | null {
    const action = this.continuation
    this.continuation = null
    return action
  }

  discardContinuation(): boolean {
    const had = this.continuation !== null
    this.continuation = null
    return had
  }

  /** End the connection after pending writes flush. */
  end(): void {
    if (this.connection.destroyed) return
    this.connection.end()
  }

  /** Drop the connection immediately. */
  destroy(): void {
    if (this.connection.destroyed) return
    this.connection.destroy()
  }
}
