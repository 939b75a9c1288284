import { describe, it, expect } from 'vitest'
import { ClientSession } from '../../../server/client-session.js'
import { FakeConnection } from '../../support/fake-editor-host.js'

const LOCAL = { kind: 'local' as const, path: '/tmp/editserve-test/server' }

function createSession(connection = new FakeConnection()) {
  return new ClientSession({ connection, endpoint: LOCAL, authenticated: true, connectionId: 'conn-1' })
}

describe('ClientSession', () => {
  it('hands out one complete line at a time', () => {
    const session = createSession()
    session.appendInput('-eval 1\n-eval 2\n-ev')
    expect(session.takeLine()).toBe('-eval 1')
    expect(session.bufferedInput).toBe('-eval 2\n-ev')
    expect(session.takeLine()).toBe('-eval 2')
    expect(session.takeLine()).toBeNull()
    session.appendInput('al 3\r\n')
    expect(session.takeLine()).toBe('-eval 3')
  })

  it('keeps a multi-byte character split across reads intact', () => {
    const session = createSession()
    const bytes = Buffer.from('-file é\n')
    session.appendInput(bytes.subarray(0, 7))
    session.appendInput(bytes.subarray(7))
    expect(session.takeLine()).toBe('-file é')
  })

  it('stops sending once the connection is gone', () => {
    const connection = new FakeConnection()
    const session = createSession(connection)
    expect(session.send('-print 1\n')).toBe(true)
    connection.destroy()
    expect(session.send('-print 2\n')).toBe(false)
    expect(connection.written).toEqual(['-print 1\n'])
    expect(session.isOpen).toBe(false)
  })

  it('holds a single continuation that runs at most once', async () => {
    const session = createSession()
    let runs = 0
    session.armContinuation(async () => {
      runs += 1
    })
    expect(() => session.armContinuation(async () => {})).toThrow('already has a pending continuation')

    const continuation = session.takeContinuation()
    expect(session.takeContinuation()).toBeNull()
    await continuation?.()
    expect(runs).toBe(1)
  })

  it('runs one exclusive task at a time, in arrival order', async () => {
    const session = createSession()
    const order: string[] = []
    let release = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })

    const first = session.exclusive(async () => {
      order.push('first:start')
      await gate
      order.push('first:end')
    })
    const second = session.exclusive(async () => {
      order.push('second')
      return 2
    })
    await Promise.resolve()
    expect(session.inFlight).toBe(true)
    expect(order).toEqual(['first:start'])

    release()
    await first
    expect(await second).toBe(2)
    expect(order).toEqual(['first:start', 'first:end', 'second'])
    expect(session.inFlight).toBe(false)
  })

  it('releases the gate when a task fails', async () => {
    const session = createSession()
    await expect(session.exclusive(async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')
    expect(session.inFlight).toBe(false)
    expect(await session.exclusive(async () => 'next')).toBe('next')
  })

  it('discards a pending continuation', () => {
    const session = createSession()
    session.armContinuation(async () => {})
    expect(session.discardContinuation()).toBe(true)
    expect(session.hasContinuation).toBe(false)
    expect(session.discardContinuation()).toBe(false)
  })

  it('builds the context the host sees', () => {
    const session = createSession()
    session.addEnvironment([{ name: 'TERM', value: 'xterm' }])
    session.directory = '/work/'
    expect(session.context(true)).toEqual({
      sessionId: session.id,
      environment: [{ name: 'TERM', value: 'xterm' }],
      directory: '/work/',
      surface: undefined,
      noWait: true,
    })
  })
})
