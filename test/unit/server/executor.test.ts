import { describe, it, expect, beforeEach } from 'vitest'
import { ClientSession } from '../../../server/client-session.js'
import { decideTeardown, Executor } from '../../../server/executor.js'
import { freezeRequestPlan, parseRequestTokens, type SurfaceRequest } from '../../../server/request-parser.js'
import { SessionRegistry } from '../../../server/session-registry.js'
import { FakeConnection, FakeEditorHost, flushAsync } from '../../support/fake-editor-host.js'

const LOCAL = { kind: 'local' as const, path: '/tmp/editserve-test/server' }

const plan = (tokens: string[], surfaceRequest: SurfaceRequest = { kind: 'none' }) =>
  freezeRequestPlan(parseRequestTokens(tokens), surfaceRequest)

describe('Executor', () => {
  let host: FakeEditorHost
  let registry: SessionRegistry
  let executor: Executor
  let connection: FakeConnection
  let session: ClientSession

  beforeEach(() => {
    host = new FakeEditorHost()
    registry = new SessionRegistry(host, { errorGraceMs: 0 })
    registry.attach()
    executor = new Executor(host, registry)
    connection = new FakeConnection()
    session = new ClientSession({ connection, endpoint: LOCAL, authenticated: true, connectionId: 'conn-1' })
    registry.register(session)
  })

  it('visits files in order, then evaluates, then closes an eval-only session', async () => {
    host.evaluator = () => '2'
    const outcome = await executor.run(session, plan(['-file', 'a', '-position', '+5:2', '-file', 'b', '-eval', '(+ 1 1)']))

    expect(host.calls).toEqual([
      { op: 'visitFile', file: { path: 'a' }, directory: undefined },
      { op: 'visitFile', file: { path: 'b', position: { line: 5, column: 2 } }, directory: undefined },
      { op: 'evaluate', expression: '(+ 1 1)' },
    ])
    expect(connection.written).toEqual(['-print 2\n'])
    expect(outcome).toEqual({ status: 'completed', teardown: { action: 'keep-open' } })
    expect(registry.has(session)).toBe(true)
  })

  it('closes an eval-only request after its results', async () => {
    host.evaluator = () => '"hi there"'
    await executor.run(session, plan(['-eval', 'greeting']))
    expect(connection.written).toEqual(['-print "hi&_there"\n'])
    expect(connection.ended).toBe(true)
    expect(registry.has(session)).toBe(false)
  })

  it('closes a -nowait session and does not keep its documents', async () => {
    const outcome = await executor.run(session, plan(['-nowait', '-file', 'a']))
    expect(outcome).toEqual({ status: 'completed', teardown: { action: 'close', reason: 'no-wait' } })
    expect(host.releases[0]?.documents).toEqual([])
    expect(connection.ended).toBe(true)
  })

  it('applies -dir and -env before visiting', async () => {
    await executor.run(session, plan(['-env', 'A=1', '-dir', '/work/', '-file', 'a']))
    expect(session.environment).toEqual([{ name: 'A', value: '1' }])
    expect(host.calls[0]).toEqual({ op: 'visitFile', file: { path: 'a' }, directory: '/work/' })
  })

  it('runs every expression and reports the first failure once', async () => {
    host.evaluator = (expression) => {
      if (expression.startsWith('bad')) throw new Error(`${expression} failed`)
      return expression
    }
    const outcome = await executor.run(session, plan(['-eval', 'bad1', '-eval', 'ok', '-eval', 'bad2']))

    expect(outcome.status).toBe('failed')
    expect(host.calls.map((call) => (call.op === 'evaluate' ? call.expression : call.op))).toEqual(['bad1', 'ok', 'bad2'])
    expect(connection.written).toEqual(['-print ok\n', '-error bad1&_failed\n'])
    expect(connection.destroyed).toBe(true)
  })

  it('keeps a session with a created surface open', async () => {
    const outcome = await executor.run(
      session,
      plan(['-tty', '/dev/pts/1', 'xterm'], { kind: 'new-text-surface', device: '/dev/pts/1', type: 'xterm', minimal: false }),
    )
    expect(outcome).toEqual({ status: 'completed', teardown: { action: 'keep-open' } })
    expect(session.ownsSurface).toBe(true)
    expect(session.displaySurface).toEqual({ id: 'surface-1', kind: 'text' })
  })

  it('reports an unsupported window system and carries on', async () => {
    host.graphicalSupported = false
    await executor.run(session, plan(['-window-system', '-file', 'a'], { kind: 'new-graphical-surface' }))
    expect(connection.written).toEqual(['-window-system-unsupported \n'])
    expect(host.calls.at(-1)).toEqual({ op: 'visitFile', file: { path: 'a' }, directory: undefined })
    expect(registry.has(session)).toBe(true)
  })

  it('borrows the current surface without owning it', async () => {
    await executor.run(session, plan(['-current-frame', '-display', ':2', '-eval', '1'], { kind: 'reuse-current', display: ':2' }))
    expect(host.calls[0]).toEqual({ op: 'selectDisplay', display: ':2' })
    expect(session.displaySurface).toEqual({ id: 'surface-current', kind: 'current' })
    expect(session.ownsSurface).toBe(false)
    expect(registry.has(session)).toBe(false)
  })

  it('suspends and resumes the session surface and stays open', async () => {
    session.displaySurface = { id: 'surface-7', kind: 'text' }
    const outcome = await executor.run(session, plan(['-suspend', '-resume']))
    expect(host.calls).toEqual([
      { op: 'suspend', surfaceId: 'surface-7' },
      { op: 'resume', surfaceId: 'surface-7' },
    ])
    expect(outcome).toEqual({ status: 'completed', teardown: { action: 'keep-open' } })
  })

  it('defers the whole request while the host is busy', async () => {
    host.state = 'busy'
    host.evaluator = () => '3'
    const outcome = await executor.run(session, plan(['-eval', 'x']))
    expect(outcome).toEqual({ status: 'deferred' })
    expect(session.hasContinuation).toBe(true)
    expect(host.calls).toEqual([])

    host.state = 'ready'
    host.emit({ type: 'ready' })
    await flushAsync()
    await flushAsync()

    expect(connection.written).toEqual(['-print 3\n'])
    expect(session.hasContinuation).toBe(false)
  })

  it('stops when the client disconnects mid-request', async () => {
    host.evaluator = () => {
      connection.destroy()
      return '1'
    }
    const outcome = await executor.run(session, plan(['-eval', 'x', '-eval', 'y']))
    expect(outcome).toEqual({ status: 'disconnected' })
    expect(host.calls).toHaveLength(1)
    expect(host.releases[0]?.reason).toBe('remote-disconnect')
  })
})

describe('decideTeardown', () => {
  const session = () => new ClientSession({ connection: new FakeConnection(), endpoint: LOCAL, authenticated: true })

  it('closes -nowait requests regardless of what they hold', () => {
    const s = session()
    s.ownsSurface = true
    expect(decideTeardown(plan(['-nowait']), s)).toEqual({ action: 'close', reason: 'no-wait' })
  })

  it('closes sessions holding nothing', () => {
    expect(decideTeardown(plan([]), session())).toEqual({ action: 'close', reason: 'empty-session' })
  })

  it('keeps sessions waiting on documents', () => {
    const s = session()
    s.documents.add({ id: 'doc:a', path: 'a' })
    expect(decideTeardown(plan([]), s)).toEqual({ action: 'keep-open' })
  })

  it('keeps sessions that asked to stay', () => {
    expect(decideTeardown(plan(['-ignore', 'x']), session())).toEqual({ action: 'keep-open' })
  })
})
