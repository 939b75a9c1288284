import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fsp from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { loadServerConfig } from '../../server/config.js'
import { createEditServer, type EditServer } from '../../server/edit-server.js'
import { RemoteEvalError, ServerUnreachable, UnreadableResult } from '../../server/errors.js'
import { MemoryEditorHost } from '../../server/memory-host.js'
import { parseLiteral, RemoteEvalClient } from '../../server/remote-eval.js'

const SECRET = 'v'.repeat(64)

describe('RemoteEvalClient', () => {
  let tempDir: string
  let server: EditServer | undefined
  let host: MemoryEditorHost

  const start = async (useTcp: boolean) => {
    const config = loadServerConfig(
      {
        EDITSERVE_NAME: 'remote',
        EDITSERVE_SOCKET_DIR: path.join(tempDir, 'sockets'),
        EDITSERVE_AUTH_DIR: path.join(tempDir, 'auth'),
        EDITSERVE_USE_TCP: useTcp ? '1' : '0',
        EDITSERVE_GRACE_MS: '10',
      },
      tempDir,
    )
    host = new MemoryEditorHost({ headless: true })
    const created = createEditServer(config, host, SECRET)
    server = created
    await created.listener.start()
  }

  const locate = (options: { timeoutMs?: number } = {}) =>
    RemoteEvalClient.locate(
      { name: 'remote', socketDir: path.join(tempDir, 'sockets'), authDir: path.join(tempDir, 'auth') },
      options,
    )

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'editserve-remote-'))
    server = undefined
  })

  afterEach(async () => {
    await server?.listener.stop()
    await fsp.rm(tempDir, { recursive: true, force: true })
  })

  it('evaluates over a local socket', async () => {
    await start(false)
    const client = await locate()
    expect(await client.evaluate('1 + 1')).toBe(2)
  })

  it('authenticates over TCP through the server file', async () => {
    await start(true)
    const client = await locate()
    expect(await client.evaluate('({ answer: 6 * 7, list: [1, "two"] })')).toEqual({ answer: 42, list: [1, 'two'] })
  })

  it('reassembles results larger than one message', async () => {
    await start(true)
    const client = await locate()
    const text = await client.evaluate('"a b&c\\n".repeat(400)', z.string())
    expect(text).toBe('a b&c\n'.repeat(400))
  })

  it('validates the result against a schema', async () => {
    await start(false)
    const client = await locate()
    await expect(client.evaluate('"not a number"', z.number())).rejects.toBeInstanceOf(UnreadableResult)
  })

  it('surfaces a server-side error', async () => {
    await start(false)
    const client = await locate()
    await expect(client.evaluate('missingName')).rejects.toThrow(RemoteEvalError)
    await expect(client.evaluate('missingName')).rejects.toThrow('missingName is not defined')
  })

  it('fails to locate a server that is not running', async () => {
    await expect(locate()).rejects.toBeInstanceOf(ServerUnreachable)
  })

  it('sees documents opened by other clients', async () => {
    await start(false)
    const file = path.join(tempDir, 'notes.txt')
    await fsp.writeFile(file, 'hello')
    await host.visitFile({ path: file }, { sessionId: 'local', environment: [], noWait: true })
    const client = await locate()
    expect(await client.evaluate('editor.documents()')).toEqual([file])
    expect(await client.evaluate(`editor.text(${JSON.stringify(file)})`)).toBe('hello')
  })
})

describe('parseLiteral', () => {
  it('reads JSON literals', () => {
    expect(parseLiteral('[1,"a",null]')).toEqual([1, 'a', null])
  })

  it('rejects malformed text', () => {
    expect(() => parseLiteral('(1 . 2)')).toThrow(UnreadableResult)
  })
})
