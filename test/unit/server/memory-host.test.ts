import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fsp from 'fs/promises'
import os from 'os'
import path from 'path'
import type { EditorHostEvent, SessionContext } from '../../../server/editor-host.js'
import { MemoryEditorHost, printValue } from '../../../server/memory-host.js'

const context = (overrides: Partial<SessionContext> = {}): SessionContext => ({
  sessionId: 'client_test',
  environment: [],
  noWait: false,
  ...overrides,
})

describe('MemoryEditorHost', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'editserve-host-'))
  })

  afterEach(async () => {
    await fsp.rm(tempDir, { recursive: true, force: true })
  })

  it('visits files relative to the session directory', async () => {
    await fsp.writeFile(path.join(tempDir, 'a.txt'), 'alpha')
    const host = new MemoryEditorHost()
    const doc = await host.visitFile({ path: 'a.txt', position: { line: 3 } }, context({ directory: tempDir }))

    expect(doc.path).toBe(path.join(tempDir, 'a.txt'))
    expect(host.findDocument(doc.path)).toMatchObject({ text: 'alpha', existed: true, position: { line: 3 } })
  })

  it('opens a missing file as a new empty document', async () => {
    const host = new MemoryEditorHost()
    const doc = await host.visitFile({ path: path.join(tempDir, 'new.txt') }, context())
    expect(host.findDocument(doc.path)).toMatchObject({ text: '', existed: false })
  })

  it('returns the same document for a second visit', async () => {
    const host = new MemoryEditorHost()
    const file = path.join(tempDir, 'same.txt')
    const first = await host.visitFile({ path: file }, context())
    const second = await host.visitFile({ path: file }, context())
    expect(second).toEqual(first)
    expect(host.listDocuments()).toHaveLength(1)
  })

  it('prints evaluation results as JSON', async () => {
    const host = new MemoryEditorHost()
    expect(await host.evaluate('1 + 1', context())).toBe('2')
    expect(await host.evaluate('"x"', context())).toBe('"x"')
    expect(await host.evaluate('undefined', context())).toBe('null')
    expect(await host.evaluate('Promise.resolve([1, 2])', context())).toBe('[1,2]')
  })

  it('exposes the client environment to expressions', async () => {
    const host = new MemoryEditorHost()
    const result = await host.evaluate('process.env.TERM', context({ environment: [{ name: 'TERM', value: 'dumb' }] }))
    expect(result).toBe('"dumb"')
  })

  it('rejects for failing expressions', async () => {
    const host = new MemoryEditorHost()
    await expect(host.evaluate('throw new Error("boom")', context())).rejects.toMatchObject({ message: 'boom' })
  })

  it('reports graphical surfaces as unsupported unless enabled', async () => {
    const plain = new MemoryEditorHost()
    expect(await plain.createGraphicalSurface({}, context())).toEqual({ kind: 'unsupported', reason: 'no window system available' })

    const graphical = new MemoryEditorHost({ graphical: true })
    const outcome = await graphical.createGraphicalSurface({ display: ':1' }, context())
    expect(outcome.kind).toBe('created')
  })

  it('opens graphical surfaces on the selected display', async () => {
    const host = new MemoryEditorHost({ graphical: true })
    expect(host.selectedDisplay).toBeUndefined()
    host.selectDisplay(':3')
    expect(host.selectedDisplay).toBe(':3')

    const outcome = await host.createGraphicalSurface({}, context())
    if (outcome.kind !== 'created') throw new Error('expected a surface')
    expect(host.listSurfaces().find((surface) => surface.id === outcome.surface.id)?.display).toBe(':3')
  })

  it('announces finished documents and closed surfaces', async () => {
    const host = new MemoryEditorHost()
    const events: EditorHostEvent[] = []
    const unsubscribe = host.subscribe((event) => events.push(event))
    const doc = await host.visitFile({ path: path.join(tempDir, 'f.txt') }, context())
    const outcome = await host.createTextSurface({ device: '/dev/pts/2', type: 'xterm' }, context())
    if (outcome.kind !== 'created') throw new Error('expected a surface')

    await host.evaluate(`editor.finish(${JSON.stringify(doc.path)})`, context())
    host.closeSurface(outcome.surface.id)
    unsubscribe()
    host.closeSurface('surface_missing')

    expect(events).toEqual([
      { type: 'document.done', document: doc },
      { type: 'surface.closed', surface: outcome.surface },
    ])
    expect(host.listDocuments()).toEqual([])
  })

  it('announces readiness after being busy', () => {
    const host = new MemoryEditorHost()
    const events: EditorHostEvent[] = []
    host.subscribe((event) => events.push(event))
    host.setReadiness('busy')
    expect(host.canCreateSurface()).toBe(false)
    host.setReadiness('ready')
    expect(events).toEqual([{ type: 'ready' }])
  })

  it('keeps a current surface unless headless', () => {
    expect(new MemoryEditorHost().currentSurface()?.kind).toBe('current')
    expect(new MemoryEditorHost({ headless: true }).currentSurface()).toBeUndefined()
  })

  it('forgets surfaces released with their session', async () => {
    const host = new MemoryEditorHost()
    const outcome = await host.createMinimalSurface({ device: '/dev/pts/4', type: 'dumb' }, context())
    if (outcome.kind !== 'created') throw new Error('expected a surface')
    await host.releaseSession({ sessionId: 'client_test', reason: 'remote-disconnect', documents: [], surface: outcome.surface })
    expect(host.listSurfaces().map((surface) => surface.id)).not.toContain(outcome.surface.id)
  })
})

describe('printValue', () => {
  it('prints bigints as numbers and functions as null', () => {
    expect(printValue(10n)).toBe('10')
    expect(printValue(() => 1)).toBe('null')
  })
})
