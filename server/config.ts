import os from 'os'
import path from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import type { RendezvousEndpoint } from './rendezvous.js'

export const DEFAULT_SERVER_NAME = 'server'
export const DEFAULT_GRACE_MS = 1000
export const DEFAULT_FALLBACK_TTY_TYPES = ['dumb']

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off', ''])
  .transform((value) => value === '1' || value === 'true' || value === 'yes' || value === 'on')

const ServerEnvSchema = z.object({
  EDITSERVE_NAME: z.string().min(1).optional(),
  EDITSERVE_SOCKET_DIR: z.string().min(1).optional(),
  EDITSERVE_USE_TCP: booleanFlag.optional(),
  EDITSERVE_HOST: z.string().min(1).optional(),
  EDITSERVE_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  EDITSERVE_AUTH_DIR: z.string().min(1).optional(),
  EDITSERVE_AUTH_KEY: z.string().optional(),
  EDITSERVE_GRACE_MS: z.coerce.number().int().min(0).max(60_000).optional(),
  EDITSERVE_ALWAYS_CURRENT_SURFACE: booleanFlag.optional(),
  EDITSERVE_FALLBACK_TTY_TYPES: z.string().optional(),
})

export type ServerConfig = {
  name: string
  socketDir: string
  authDir: string
  useTcp: boolean
  host: string
  port: number
  /** Fixed secret; generated per instance when absent. */
  authKey?: string
  graceMs: number
  alwaysUseCurrentSurface: boolean
  fallbackTtyTypes: string[]
}

/**
 * `$XDG_RUNTIME_DIR/editserve` when the runtime dir is set, else
 * `<tmpdir>/editserve<uid>`, so each user gets a private socket directory.
 */
export function resolveDefaultSocketDir(envVars: NodeJS.ProcessEnv = process.env): string {
  const runtimeDir = envVars.XDG_RUNTIME_DIR?.trim()
  if (runtimeDir) return path.join(runtimeDir, 'editserve')
  const uid = typeof process.getuid === 'function' ? process.getuid() : 0
  return path.join(os.tmpdir(), `editserve-${uid}`)
}

export function resolveDefaultAuthDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.editserve', 'server')
}

function blankToUndefined(envVars: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {}
  for (const key of Object.keys(ServerEnvSchema.shape)) {
    const value = envVars[key]?.trim()
    out[key] = value ? value : undefined
  }
  return out
}

export function loadServerConfig(envVars: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(blankToUndefined(envVars))
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid server configuration (${issues.join('; ')})`)
  }
  const env = parsed.data
  const fallbackTtyTypes = env.EDITSERVE_FALLBACK_TTY_TYPES
    ? env.EDITSERVE_FALLBACK_TTY_TYPES.split(',').map((s) => s.trim()).filter(Boolean)
    : DEFAULT_FALLBACK_TTY_TYPES

  return {
    name: env.EDITSERVE_NAME ?? DEFAULT_SERVER_NAME,
    socketDir: env.EDITSERVE_SOCKET_DIR ? path.resolve(env.EDITSERVE_SOCKET_DIR) : resolveDefaultSocketDir(envVars),
    authDir: env.EDITSERVE_AUTH_DIR ? path.resolve(env.EDITSERVE_AUTH_DIR) : resolveDefaultAuthDir(homeDir),
    useTcp: env.EDITSERVE_USE_TCP ?? false,
    host: env.EDITSERVE_HOST ?? '127.0.0.1',
    port: env.EDITSERVE_PORT ?? 0,
    authKey: env.EDITSERVE_AUTH_KEY,
    graceMs: env.EDITSERVE_GRACE_MS ?? DEFAULT_GRACE_MS,
    alwaysUseCurrentSurface: env.EDITSERVE_ALWAYS_CURRENT_SURFACE ?? false,
    fallbackTtyTypes,
  }
}

/** The endpoint the configured server listens on. `secret` is required for TCP. */
export function endpointFromConfig(config: ServerConfig, secret: string): RendezvousEndpoint {
  if (!config.useTcp) {
    return { kind: 'local', path: path.join(config.socketDir, config.name) }
  }
  return {
    kind: 'tcp',
    host: config.host,
    port: config.port,
    secret,
    serverFile: path.join(config.authDir, config.name),
  }
}
