import { EventEmitter } from 'events'
import fs from 'fs/promises'
import path from 'path'
import vm from 'vm'
import { nanoid } from 'nanoid'
import { logger } from './logger.js'
import { isErrnoException } from './rendezvous.js'
import type {
  DocumentHandle,
  EditorHost,
  EditorHostEvent,
  GraphicalSurfaceRequest,
  HostReadiness,
  SessionContext,
  SessionRelease,
  SurfaceHandle,
  SurfaceKind,
  SurfaceOutcome,
  TextSurfaceRequest,
} from './editor-host.js'
import type { FilePosition, FileRequest } from './request-parser.js'

const log = logger.child({ component: 'memory-host' })

const DEFAULT_EVAL_TIMEOUT_MS = 5000

export type MemoryDocument = DocumentHandle & {
  text: string
  position?: FilePosition
  /** Whether the file existed when it was visited. */
  existed: boolean
}

export type MemorySurface = SurfaceHandle & {
  suspended: boolean
  display?: string
  device?: string
  parameters?: Readonly<Record<string, unknown>>
}

export type MemoryHostOptions = {
  /** Whether graphical surfaces can be created at all. */
  graphical?: boolean
  /** The platform only offers graphical surfaces. */
  requiresGraphical?: boolean
  /** Start without a current surface, as a headless daemon does. */
  headless?: boolean
  evalTimeoutMs?: number
}

/**
 * In-process editor: documents live in a map, expressions run as JavaScript
 * in a `vm` context and results print as JSON. Evaluated code sees an
 * `editor` object for finishing documents and closing surfaces.
 */
export class MemoryEditorHost implements EditorHost {
  private emitter = new EventEmitter()
  private documents = new Map<string, MemoryDocument>()
  private surfaces = new Map<string, MemorySurface>()
  private current: MemorySurface | undefined
  private state: HostReadiness = 'ready'
  private display: string | undefined
  private sandbox: vm.Context

  constructor(private options: MemoryHostOptions = {}) {
    if (!options.headless) {
      this.current = this.addSurface('current', {})
    }
    this.sandbox = vm.createContext({
      editor: {
        documents: () => this.listDocuments().map((doc) => doc.path),
        text: (filePath: string) => this.findDocument(filePath)?.text,
        finish: (filePath: string) => this.finishDocument(filePath),
        surfaces: () => [...this.surfaces.values()].map((surface) => ({ ...surface })),
        closeSurface: (id: string) => this.closeSurface(id),
      },
      JSON,
      Math,
    })
  }

  readiness(): HostReadiness {
    return this.state
  }

  /** Mark the host busy or ready; becoming ready announces it to subscribers. */
  setReadiness(next: HostReadiness): void {
    if (this.state === next) return
    this.state = next
    if (next === 'ready') this.emit({ type: 'ready' })
  }

  canCreateSurface(): boolean {
    return this.state === 'ready'
  }

  requiresGraphicalSurface(): boolean {
    return this.options.requiresGraphical ?? false
  }

  currentSurface(): SurfaceHandle | undefined {
    return this.current ? surfaceHandle(this.current) : undefined
  }

  selectDisplay(display: string): void {
    this.display = display
  }

  get selectedDisplay(): string | undefined {
    return this.display
  }

  async createMinimalSurface(request: TextSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome> {
    return this.createTerminalSurface('minimal', request, context)
  }

  async createTextSurface(request: TextSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome> {
    return this.createTerminalSurface('text', request, context)
  }

  async createGraphicalSurface(request: GraphicalSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome> {
    if (!this.options.graphical) {
      return { kind: 'unsupported', reason: 'no window system available' }
    }
    const surface = this.addSurface('graphical', {
      display: request.display ?? this.display,
      parameters: request.parameters,
    })
    log.debug({ event: 'surface_created', surfaceId: surface.id, kind: 'graphical', sessionId: context.sessionId }, 'Created surface')
    return { kind: 'created', surface: surfaceHandle(surface) }
  }

  async suspendSurface(surface: SurfaceHandle): Promise<void> {
    const target = this.surfaces.get(surface.id)
    if (target) target.suspended = true
  }

  async resumeSurface(surface: SurfaceHandle): Promise<void> {
    const target = this.surfaces.get(surface.id)
    if (target) target.suspended = false
  }

  async visitFile(file: Readonly<FileRequest>, context: SessionContext): Promise<DocumentHandle> {
    const filePath = path.resolve(context.directory ?? process.cwd(), file.path)
    const existing = this.documents.get(filePath)
    if (existing) {
      existing.position = file.position ?? existing.position
      return documentHandle(existing)
    }

    let text = ''
    let existed = true
    try {
      text = await fs.readFile(filePath, 'utf-8')
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') throw err
      existed = false
    }
    const doc: MemoryDocument = { id: `doc_${nanoid(8)}`, path: filePath, text, existed, position: file.position }
    this.documents.set(filePath, doc)
    log.debug({ event: 'document_opened', path: filePath, existed, sessionId: context.sessionId }, 'Opened document')
    return documentHandle(doc)
  }

  async evaluate(expression: string, context: SessionContext): Promise<string> {
    this.sandbox.process = { env: Object.fromEntries(context.environment.map((entry) => [entry.name, entry.value])) }
    const result: unknown = await vm.runInContext(expression, this.sandbox, {
      timeout: this.options.evalTimeoutMs ?? DEFAULT_EVAL_TIMEOUT_MS,
      filename: 'eval',
    })
    return printValue(result)
  }

  async releaseSession(release: SessionRelease): Promise<void> {
    if (release.surface) {
      this.surfaces.delete(release.surface.id)
    }
    log.debug(
      { event: 'session_released', sessionId: release.sessionId, reason: release.reason, documents: release.documents.length },
      'Released session resources',
    )
  }

  subscribe(listener: (event: EditorHostEvent) => void): () => void {
    this.emitter.on('event', listener)
    return () => {
      this.emitter.off('event', listener)
    }
  }

  listDocuments(): MemoryDocument[] {
    return [...this.documents.values()]
  }

  findDocument(filePath: string): MemoryDocument | undefined {
    return this.documents.get(path.resolve(filePath))
  }

  listSurfaces(): MemorySurface[] {
    return [...this.surfaces.values()]
  }

  /** The user is done with a document: close it and release clients waiting on it. */
  finishDocument(filePath: string): boolean {
    const doc = this.findDocument(filePath)
    if (!doc) return false
    this.documents.delete(doc.path)
    this.emit({ type: 'document.done', document: documentHandle(doc) })
    return true
  }

  closeSurface(id: string): boolean {
    const surface = this.surfaces.get(id)
    if (!surface) return false
    this.surfaces.delete(id)
    if (this.current?.id === id) this.current = undefined
    this.emit({ type: 'surface.closed', surface: surfaceHandle(surface) })
    return true
  }

  private async createTerminalSurface(
    kind: 'text' | 'minimal',
    request: TextSurfaceRequest,
    context: SessionContext,
  ): Promise<SurfaceOutcome> {
    if (this.options.requiresGraphical) {
      return { kind: 'unsupported', reason: 'terminal surfaces are not available' }
    }
    const surface = this.addSurface(kind, { device: request.device, parameters: request.parameters })
    log.debug({ event: 'surface_created', surfaceId: surface.id, kind, device: request.device, sessionId: context.sessionId }, 'Created surface')
    return { kind: 'created', surface: surfaceHandle(surface) }
  }

  private addSurface(kind: SurfaceKind, fields: Pick<MemorySurface, 'display' | 'device' | 'parameters'>): MemorySurface {
    const surface: MemorySurface = { id: `surface_${nanoid(8)}`, kind, suspended: false, ...fields }
    this.surfaces.set(surface.id, surface)
    return surface
  }

  private emit(event: EditorHostEvent): void {
    this.emitter.emit('event', event)
  }
}

function documentHandle(doc: MemoryDocument): DocumentHandle {
  return { id: doc.id, path: doc.path }
}

function surfaceHandle(surface: MemorySurface): SurfaceHandle {
  return { id: surface.id, kind: surface.kind }
}

/** Print a value as the JSON literal a remote reader parses back. */
export function printValue(value: unknown): string {
  if (value === undefined) return 'null'
  if (typeof value === 'bigint') return value.toString()
  const printed = JSON.stringify(value)
  return printed === undefined ? 'null' : printed
}
