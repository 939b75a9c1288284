import { AuthenticationFailed, ParseError } from './errors.js'
import { logger } from './logger.js'
import {
  checkAuthentication,
  decodeArguments,
  freezeRequestPlan,
  parseRequestTokens,
  type RequestPlan,
} from './request-parser.js'
import { selectSurface, type SurfaceEnvironment } from './surface-selection.js'
import type { ClientSession } from './client-session.js'
import type { EditorHost } from './editor-host.js'
import type { ExecutionOutcome, Executor } from './executor.js'
import type { SessionRegistry } from './session-registry.js'

const log = logger.child({ component: 'dispatcher' })

export type DispatcherOptions = {
  /** Shared secret for TCP endpoints; local sockets are trusted by file mode. */
  secret?: string
  alwaysUseCurrentSurface: boolean
  fallbackTtyTypes: readonly string[]
}

export type DispatchResult =
  | { status: 'rejected'; reason: 'auth-failed' | 'parse-error' }
  | { status: 'ignored' }
  | ExecutionOutcome

/** Hide the key of a leading `-auth` before a line is logged. */
export function redactRequestLine(line: string): string {
  return line.replace(/^-auth \S+/, '-auth [REDACTED]')
}

/**
 * Turns one request line into a plan and hands it to the executor. The
 * authentication check runs before a single argument is decoded.
 */
export class ProtocolDispatcher {
  constructor(
    private host: EditorHost,
    private registry: SessionRegistry,
    private executor: Executor,
    private options: DispatcherOptions,
  ) {}

  async handleLine(session: ClientSession, line: string): Promise<DispatchResult> {
    if (!session.isOpen) return { status: 'ignored' }

    // Work deferred by a busy host goes before anything newer from the same
    // client. While the host is still busy it stays armed for the `ready` event.
    if (session.hasContinuation && this.host.readiness() !== 'busy') {
      const continuation = session.takeContinuation()
      if (continuation) await continuation()
      if (!session.isOpen) return { status: 'ignored' }
    }

    let body = line
    if (!session.authenticated) {
      session.authAttempted = true
      const auth = this.options.secret === undefined
        ? { ok: false as const }
        : checkAuthentication(line, this.options.secret)
      if (!auth.ok) {
        log.warn({ event: 'auth_failed', sessionId: session.id, remoteAddress: session.remoteAddress }, 'Client failed to authenticate')
        await this.registry.abort(session, new AuthenticationFailed(), 'auth-failed')
        return { status: 'rejected', reason: 'auth-failed' }
      }
      session.authenticated = true
      log.info({ event: 'auth_ok', sessionId: session.id }, 'Client authenticated')
      body = auth.rest
    }

    log.debug({ event: 'request_received', sessionId: session.id, line: redactRequestLine(line) }, 'Request line')

    let plan: RequestPlan
    try {
      plan = this.plan(body)
    } catch (err) {
      if (!(err instanceof ParseError)) throw err
      log.info({ event: 'request_rejected', sessionId: session.id, token: err.token, message: err.message }, 'Malformed request')
      await this.registry.abort(session, err)
      return { status: 'rejected', reason: 'parse-error' }
    }

    return this.executor.run(session, plan)
  }

  plan(body: string): RequestPlan {
    const request = parseRequestTokens(decodeArguments(body))
    const surfaceRequest = selectSurface(request.surface, request.wantsCurrentSurfaceOnly, this.surfaceEnvironment())
    return freezeRequestPlan(request, surfaceRequest)
  }

  private surfaceEnvironment(): SurfaceEnvironment {
    return {
      alwaysUseCurrentSurface: this.options.alwaysUseCurrentSurface,
      canCreateSurface: this.host.canCreateSurface(),
      requiresGraphicalSurface: this.host.requiresGraphicalSurface(),
      fallbackTtyTypes: this.options.fallbackTtyTypes,
    }
  }
}
