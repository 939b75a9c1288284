/**
 * The editor side of the server: documents, display surfaces and the
 * expression evaluator. The protocol engine only holds the opaque handles this
 * interface hands out and never looks inside them.
 */
import type { EnvironmentEntry, FileRequest } from './request-parser.js'

export type DocumentHandle = {
  readonly id: string
  readonly path: string
}

export type SurfaceKind = 'current' | 'text' | 'minimal' | 'graphical'

export type SurfaceHandle = {
  readonly id: string
  readonly kind: SurfaceKind
}

/** Client-side context an operation runs under. */
export type SessionContext = {
  sessionId: string
  environment: readonly EnvironmentEntry[]
  directory?: string
  surface?: SurfaceHandle
  noWait: boolean
}

export type TextSurfaceRequest = {
  device: string
  type: string
  parameters?: Readonly<Record<string, unknown>>
}

export type GraphicalSurfaceRequest = {
  display?: string
  parentId?: string
  parameters?: Readonly<Record<string, unknown>>
}

export type SurfaceOutcome =
  | { kind: 'created'; surface: SurfaceHandle }
  | { kind: 'unsupported'; reason?: string }

/** `busy` while a modal interaction must unwind before the host can switch context. */
export type HostReadiness = 'ready' | 'busy'

export type SessionReleaseReason =
  | 'no-wait'
  | 'empty-session'
  | 'remote-disconnect'
  | 'auth-failed'
  | 'error'
  | 'documents-done'
  | 'surface-closed'
  | 'server-stop'

/** Resources a closing session leaves behind for the host to dispose of. */
export type SessionRelease = {
  sessionId: string
  reason: SessionReleaseReason
  documents: readonly DocumentHandle[]
  /** Set only for a surface the session created. */
  surface?: SurfaceHandle
}

export type EditorHostEvent =
  | { type: 'document.done'; document: DocumentHandle }
  | { type: 'surface.closed'; surface: SurfaceHandle }
  | { type: 'ready' }

export interface EditorHost {
  readiness(): HostReadiness
  canCreateSurface(): boolean
  requiresGraphicalSurface(): boolean
  currentSurface(): SurfaceHandle | undefined
  selectDisplay(display: string): void

  createMinimalSurface(request: TextSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome>
  createTextSurface(request: TextSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome>
  createGraphicalSurface(request: GraphicalSurfaceRequest, context: SessionContext): Promise<SurfaceOutcome>
  suspendSurface(surface: SurfaceHandle): Promise<void>
  resumeSurface(surface: SurfaceHandle): Promise<void>

  visitFile(file: Readonly<FileRequest>, context: SessionContext): Promise<DocumentHandle>
  /** Evaluate and return the printed form of the value. */
  evaluate(expression: string, context: SessionContext): Promise<string>

  releaseSession(release: SessionRelease): Promise<void>
  subscribe(listener: (event: EditorHostEvent) => void): () => void
}

export function sameSurface(a: SurfaceHandle | undefined, b: SurfaceHandle | undefined): boolean {
  return a !== undefined && b !== undefined && a.id === b.id
}
