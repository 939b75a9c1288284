import type { SurfaceHints, SurfaceRequest } from './request-parser.js'

/** What the server knows about surfaces at the moment a request is planned. */
export type SurfaceEnvironment = {
  /** Reuse the current surface whenever the client asks for it. */
  alwaysUseCurrentSurface: boolean
  /** False while the host cannot safely create a new surface. */
  canCreateSurface: boolean
  /** The platform only offers graphical surfaces. */
  requiresGraphicalSurface: boolean
  /** Terminal types served by the minimal, non-interactive surface. */
  fallbackTtyTypes: readonly string[]
}

/**
 * Pick the display surface for a request. Rules, first match wins:
 *
 * 1. current surface requested, and demanded or no new surface possible
 * 2. terminal of a fallback type: minimal surface
 * 3. graphical requested, or implied by the platform for a request that wants a surface
 * 4. terminal device and type: text surface
 * 5. current surface requested but refused by rule 1: reuse it anyway
 */
export function selectSurface(
  hints: SurfaceHints,
  wantsCurrentSurfaceOnly: boolean,
  env: SurfaceEnvironment,
): SurfaceRequest {
  const reuseCurrent = (): SurfaceRequest => ({ kind: 'reuse-current', display: hints.display })

  if (wantsCurrentSurfaceOnly && (env.alwaysUseCurrentSurface || !env.canCreateSurface)) {
    return reuseCurrent()
  }

  if (hints.tty && env.fallbackTtyTypes.includes(hints.tty.type)) {
    return { kind: 'new-text-surface', device: hints.tty.device, type: hints.tty.type, minimal: true }
  }

  const wantsSomeSurface = wantsCurrentSurfaceOnly || hints.tty !== undefined
  if (hints.windowSystem || (env.requiresGraphicalSurface && wantsSomeSurface)) {
    return { kind: 'new-graphical-surface', display: hints.display, parentId: hints.parentId }
  }

  if (hints.tty) {
    return { kind: 'new-text-surface', device: hints.tty.device, type: hints.tty.type, minimal: false }
  }

  if (wantsCurrentSurfaceOnly) {
    return reuseCurrent()
  }

  return { kind: 'none' }
}
