import { MAX_MESSAGE_BYTES } from '../shared/edit-protocol.js'
import { EvaluationError } from './errors.js'
import { logger } from './logger.js'
import { framePrint, WINDOW_SYSTEM_UNSUPPORTED_LINE } from './reply-framer.js'
import type { ClientSession } from './client-session.js'
import type { EditorHost, SessionContext, SurfaceOutcome } from './editor-host.js'
import type { RequestPlan } from './request-parser.js'
import type { SessionRegistry } from './session-registry.js'

const log = logger.child({ component: 'executor' })

export type TeardownDecision =
  | { action: 'close'; reason: 'no-wait' | 'empty-session' }
  | { action: 'keep-open' }

export type ExecutionOutcome =
  | { status: 'completed'; teardown: TeardownDecision }
  | { status: 'deferred' }
  | { status: 'disconnected' }
  | { status: 'failed'; error: unknown }

/**
 * Decide, after a plan ran, whether the session ends now. Documents opened
 * and a surface created for the session keep it open; printed results do not,
 * they have already been delivered.
 */
export function decideTeardown(plan: RequestPlan, session: ClientSession): TeardownDecision {
  if (plan.wantsNoWait) return { action: 'close', reason: 'no-wait' }
  const holdsSomething = session.documents.size > 0 || session.ownsSurface
  if (!holdsSomething && !plan.keepSessionAlive) return { action: 'close', reason: 'empty-session' }
  return { action: 'keep-open' }
}

export type ExecutorOptions = {
  maxMessageBytes?: number
}

export class Executor {
  private maxMessageBytes: number

  constructor(
    private host: EditorHost,
    private registry: SessionRegistry,
    options: ExecutorOptions = {},
  ) {
    this.maxMessageBytes = options.maxMessageBytes ?? MAX_MESSAGE_BYTES
  }

  /**
   * Run a plan, report its failure or apply the teardown policy. When the host
   * is busy the whole run is armed as the session's continuation instead.
   */
  async run(session: ClientSession, plan: RequestPlan): Promise<ExecutionOutcome> {
    if (!session.isOpen) return { status: 'disconnected' }

    if (this.host.readiness() === 'busy') {
      // The slot holds one action; a request deferred behind another runs after it.
      const earlier = session.takeContinuation()
      session.armContinuation(async () => {
        if (earlier) await earlier()
        await this.run(session, plan)
      })
      log.debug({ event: 'request_deferred', sessionId: session.id }, 'Host busy; request deferred')
      return { status: 'deferred' }
    }

    session.busy = true
    let outcome: ExecutionOutcome
    try {
      outcome = await this.perform(session, plan)
    } catch (error) {
      outcome = { status: 'failed', error }
    } finally {
      session.busy = false
    }

    switch (outcome.status) {
      case 'failed':
        await this.registry.abort(session, outcome.error)
        break
      case 'disconnected':
        await this.registry.teardown(session, 'remote-disconnect')
        break
      case 'completed':
        if (outcome.teardown.action === 'close') {
          await this.registry.teardown(session, outcome.teardown.reason)
        } else {
          log.debug({ event: 'session_waiting', sessionId: session.id, documents: session.documents.size }, 'Session stays open')
        }
        break
      case 'deferred':
        break
    }
    return outcome
  }

  private async perform(session: ClientSession, plan: RequestPlan): Promise<ExecutionOutcome> {
    session.addEnvironment(plan.environment)
    if (plan.directory !== undefined) session.directory = plan.directory

    if (!(await this.prepareSurface(session, plan))) return { status: 'disconnected' }

    const context = (): SessionContext => session.context(plan.wantsNoWait)

    for (const file of plan.files) {
      const document = await this.host.visitFile(file, context())
      if (!session.isOpen) return { status: 'disconnected' }
      // A no-wait client is never waited on, so it does not own what it opened.
      if (!plan.wantsNoWait) session.documents.add(document)
      log.debug({ event: 'file_visited', sessionId: session.id, path: file.path, position: file.position }, 'Visited file')
    }

    for (const action of plan.actions) {
      const surface = session.displaySurface
      if (!surface) {
        log.debug({ event: 'action_skipped', sessionId: session.id, action }, 'No surface to act on')
        continue
      }
      if (action === 'suspend') await this.host.suspendSurface(surface)
      else await this.host.resumeSurface(surface)
    }

    const failures: EvaluationError[] = []
    for (const expression of plan.expressions) {
      let printed: string
      try {
        printed = await this.host.evaluate(expression, context())
      } catch (err) {
        failures.push(new EvaluationError(expression, err))
        log.debug({ err, event: 'evaluation_failed', sessionId: session.id }, 'Expression failed')
        continue
      }
      if (!session.sendAll(framePrint(printed, this.maxMessageBytes))) return { status: 'disconnected' }
    }
    if (failures.length > 0) return { status: 'failed', error: failures[0] }

    return { status: 'completed', teardown: decideTeardown(plan, session) }
  }

  /** Returns false when the client went away while the surface was being set up. */
  private async prepareSurface(session: ClientSession, plan: RequestPlan): Promise<boolean> {
    const request = plan.surfaceRequest
    const context = session.context(plan.wantsNoWait)
    let outcome: SurfaceOutcome

    switch (request.kind) {
      case 'none':
        return true
      case 'reuse-current': {
        if (request.display !== undefined) this.host.selectDisplay(request.display)
        const current = this.host.currentSurface()
        if (current && !session.ownsSurface) session.displaySurface = current
        return true
      }
      case 'new-text-surface': {
        const textRequest = { device: request.device, type: request.type, parameters: plan.surfaceParameters }
        outcome = request.minimal
          ? await this.host.createMinimalSurface(textRequest, context)
          : await this.host.createTextSurface(textRequest, context)
        break
      }
      case 'new-graphical-surface':
        outcome = await this.host.createGraphicalSurface(
          { display: request.display, parentId: request.parentId, parameters: plan.surfaceParameters },
          context,
        )
        break
    }

    if (!session.isOpen) return false
    if (outcome.kind === 'unsupported') {
      log.info({ event: 'surface_unsupported', sessionId: session.id, reason: outcome.reason }, 'Surface could not be created')
      return session.send(WINDOW_SYSTEM_UNSUPPORTED_LINE)
    }
    session.displaySurface = outcome.surface
    session.ownsSurface = true
    return true
  }
}
