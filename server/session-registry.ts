import { EventEmitter } from 'events'
import { logger, withLogContext } from './logger.js'
import { describeError, EditServerError } from './errors.js'
import { formatErrorLine } from './reply-framer.js'
import type { ClientSession } from './client-session.js'
import type { EditorHost, EditorHostEvent, SessionReleaseReason, SurfaceHandle } from './editor-host.js'
import { sameSurface } from './editor-host.js'

const log = logger.child({ component: 'session-registry' })

export const DEFAULT_ERROR_GRACE_MS = 1000

export type SessionSummary = {
  sessionId: string
  connectionId: string
  endpoint: string
  authenticated: boolean
  documents: string[]
  surface?: SurfaceHandle
  hasContinuation: boolean
  connectedAt: number
}

export type SessionRegistryOptions = {
  /** Delay between an `-error` reply and the forced close. */
  errorGraceMs?: number
}

/**
 * All live sessions, keyed by connection id. Node runs these mutations on one
 * thread, so each insert and removal is atomic with respect to the others.
 * Emits `session.closed` exactly once per session.
 */
export class SessionRegistry extends EventEmitter {
  private sessions = new Map<string, ClientSession>()
  private unsubscribeHost: (() => void) | null = null
  readonly errorGraceMs: number

  constructor(private host: EditorHost, options: SessionRegistryOptions = {}) {
    super()
    this.errorGraceMs = options.errorGraceMs ?? DEFAULT_ERROR_GRACE_MS
  }

  /** Start consuming host events. Idempotent. */
  attach(): void {
    if (this.unsubscribeHost) return
    this.unsubscribeHost = this.host.subscribe((event) => {
      this.onHostEvent(event).catch((err) => log.warn({ err, event: event.type }, 'Host event handling failed'))
    })
  }

  detach(): void {
    this.unsubscribeHost?.()
    this.unsubscribeHost = null
  }

  register(session: ClientSession): void {
    if (this.sessions.has(session.connectionId)) {
      throw new Error(`Session for connection ${session.connectionId} is already registered`)
    }
    this.sessions.set(session.connectionId, session)
    this.emit('session.added', session)
  }

  get(connectionId: string): ClientSession | undefined {
    return this.sessions.get(connectionId)
  }

  find(predicate: (session: ClientSession) => boolean): ClientSession | undefined {
    for (const session of this.sessions.values()) {
      if (predicate(session)) return session
    }
    return undefined
  }

  list(): ClientSession[] {
    return [...this.sessions.values()]
  }

  get size(): number {
    return this.sessions.size
  }

  has(session: ClientSession): boolean {
    return this.sessions.get(session.connectionId) === session
  }

  /** Remove without closing. Returns false when it was already gone. */
  remove(session: ClientSession): boolean {
    if (!this.has(session)) return false
    this.sessions.delete(session.connectionId)
    return true
  }

  summaries(): SessionSummary[] {
    return this.list().map((session) => ({
      sessionId: session.id,
      connectionId: session.connectionId,
      endpoint: session.endpointName,
      authenticated: session.authenticated,
      documents: [...session.documents].map((doc) => doc.path),
      surface: session.displaySurface,
      hasContinuation: session.hasContinuation,
      connectedAt: session.connectedAt,
    }))
  }

  /**
   * Close a session: unregister it, drop its continuation, close the
   * connection and hand its resources back to the host. Repeated calls for
   * the same session are no-ops.
   */
  async teardown(session: ClientSession, reason: SessionReleaseReason, options: { force?: boolean } = {}): Promise<void> {
    if (session.status === 'closed') return
    session.status = 'closed'
    this.remove(session)

    const discarded = session.discardContinuation()
    if (options.force) session.destroy()
    else session.end()

    const documents = [...session.documents]
    session.documents.clear()
    const surface = session.ownsSurface ? session.displaySurface : undefined

    log.info(
      {
        event: 'session_closed',
        sessionId: session.id,
        connectionId: session.connectionId,
        reason,
        documents: documents.length,
        discardedContinuation: discarded,
        durationMs: Date.now() - session.connectedAt,
        sessionCount: this.sessions.size,
      },
      'Client session closed',
    )

    this.emit('session.closed', session, reason)

    try {
      await this.host.releaseSession({ sessionId: session.id, reason, documents, surface })
    } catch (err) {
      log.warn({ err, sessionId: session.id }, 'Host failed to release session resources')
    }
  }

  /**
   * Report a failure to the client as one `-error` line, give it time to read
   * it, then force the connection closed.
   */
  async abort(session: ClientSession, error: unknown, reason: SessionReleaseReason = 'error'): Promise<void> {
    if (session.status !== 'open') return
    session.status = 'closing'
    session.discardContinuation()
    const message = describeError(error)
    if (error instanceof EditServerError) {
      log.warn({ event: 'session_failed', sessionId: session.id, code: error.code, message }, 'Client request failed')
    } else {
      log.error({ err: error, event: 'session_failed', sessionId: session.id }, 'Unexpected failure serving client')
    }
    session.send(formatErrorLine(message))
    if (this.errorGraceMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.errorGraceMs))
    }
    await this.teardown(session, reason, { force: true })
  }

  /**
   * The single place deferred session work runs: each pending continuation
   * is taken out of its slot and invoked once, inside the session's request
   * gate. Emits `session.idle` after each so buffered lines can follow.
   * Returns how many ran.
   */
  async runContinuations(): Promise<number> {
    const ran = await Promise.all(this.list().map((session) => this.runContinuation(session)))
    return ran.filter(Boolean).length
  }

  private async runContinuation(session: ClientSession): Promise<boolean> {
    if (!session.hasContinuation) return false
    const ran = await session.exclusive(async () => {
      // Taken inside the gate: a request line may have run it meanwhile.
      const continuation = session.takeContinuation()
      if (!continuation) return false
      await withLogContext({ sessionId: session.id, connectionId: session.connectionId }, continuation)
      return true
    })
    if (ran) this.emit('session.idle', session)
    return ran
  }

  async closeAll(reason: SessionReleaseReason): Promise<void> {
    await Promise.all(this.list().map((session) => this.teardown(session, reason, { force: true })))
  }

  private async onHostEvent(event: EditorHostEvent): Promise<void> {
    switch (event.type) {
      case 'ready':
        await this.runContinuations()
        return
      case 'document.done': {
        const finished: ClientSession[] = []
        for (const session of this.list()) {
          let released = false
          for (const doc of session.documents) {
            if (doc.id !== event.document.id) continue
            session.documents.delete(doc)
            released = true
          }
          if (released && session.documents.size === 0 && !session.busy && session.status === 'open') {
            finished.push(session)
          }
        }
        await Promise.all(finished.map((session) => this.teardown(session, 'documents-done')))
        return
      }
      case 'surface.closed': {
        const closed = this.list().filter((session) => sameSurface(session.displaySurface, event.surface))
        await Promise.all(closed.map((session) => this.teardown(session, 'surface-closed')))
        return
      }
    }
  }
}
