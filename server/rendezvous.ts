import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { isValidServerSecret } from './auth.js'
import { ConfigError, ServerUnreachable } from './errors.js'

export const LocalEndpointSchema = z.object({
  kind: z.literal('local'),
  path: z.string().min(1),
})

export const TcpEndpointSchema = z.object({
  kind: z.literal('tcp'),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  secret: z.string().refine(isValidServerSecret, 'secret must be 64 printable ASCII characters'),
  /** Where the listener publishes `<address>:<port>\n<secret>` once bound. */
  serverFile: z.string().min(1).optional(),
})

export const RendezvousEndpointSchema = z.discriminatedUnion('kind', [LocalEndpointSchema, TcpEndpointSchema])

export type LocalEndpoint = z.infer<typeof LocalEndpointSchema>
export type TcpEndpoint = z.infer<typeof TcpEndpointSchema>
export type RendezvousEndpoint = z.infer<typeof RendezvousEndpointSchema>

export function validateEndpoint(input: unknown): RendezvousEndpoint {
  const parsed = RendezvousEndpointSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'endpoint'}: ${issue.message}`)
    throw new ConfigError(`Invalid rendezvous endpoint (${issues.join('; ')})`)
  }
  return parsed.data
}

/** Identity used in logs and in `ServerAlreadyRunning`. Never includes the secret. */
export function describeEndpoint(endpoint: RendezvousEndpoint): string {
  if (endpoint.kind === 'local') return endpoint.path
  return `${endpoint.host}:${endpoint.port}`
}

/** Local-domain sessions are trusted through filesystem permissions. */
export function endpointRequiresAuth(endpoint: RendezvousEndpoint): endpoint is TcpEndpoint {
  return endpoint.kind === 'tcp'
}

// ──────────────────────────────────────────────────────────────
// Server file (remote mode)
// ──────────────────────────────────────────────────────────────

export function formatServerFile(endpoint: Pick<TcpEndpoint, 'host' | 'port' | 'secret'>): string {
  return `${endpoint.host}:${endpoint.port}\n${endpoint.secret}`
}

/**
 * Parse `<address>:<port>[ <pid>]\n<secret>`. The address may itself contain
 * colons (IPv6), so the port is taken after the last one.
 */
export function parseServerFile(text: string, source = 'server file'): TcpEndpoint {
  const newline = text.indexOf('\n')
  if (newline === -1) throw new ConfigError(`Malformed ${source}: missing secret line`)
  const addressLine = text.slice(0, newline).trim().split(/\s+/)[0] ?? ''
  const secret = text.slice(newline + 1).replace(/\r?\n$/, '')

  const colon = addressLine.lastIndexOf(':')
  if (colon <= 0) throw new ConfigError(`Malformed ${source}: expected <address>:<port>`)
  const host = addressLine.slice(0, colon).replace(/^\[(.*)\]$/, '$1')
  const port = Number(addressLine.slice(colon + 1))

  const parsed = TcpEndpointSchema.safeParse({ kind: 'tcp', host, port, secret })
  if (!parsed.success) {
    throw new ConfigError(`Malformed ${source}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`)
  }
  return parsed.data
}

export async function writeServerFile(filePath: string, endpoint: Pick<TcpEndpoint, 'host' | 'port' | 'secret'>): Promise<void> {
  const dir = path.dirname(filePath)
  await fs.mkdir(dir, { recursive: true, mode: 0o700 })
  const tempPath = path.join(dir, `${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}`)
  await fs.writeFile(tempPath, formatServerFile(endpoint), { encoding: 'utf8', mode: 0o600 })
  await fs.rename(tempPath, filePath)
}

export async function readServerFile(filePath: string): Promise<TcpEndpoint> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    throw new ServerUnreachable(filePath, error)
  }
  return parseServerFile(text, filePath)
}

/** Remove a file the server published. Missing files are fine. */
export async function removeRendezvousFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath)
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return
    throw error
  }
}

// ──────────────────────────────────────────────────────────────
// Locating a server by name
// ──────────────────────────────────────────────────────────────

export type LocateOptions = {
  name: string
  socketDir: string
  authDir: string
  /** Explicit server file; skips the socket lookup. */
  serverFile?: string
  /** Explicit socket path; skips the server file lookup. */
  socketPath?: string
}

/**
 * Resolve where a named server listens: an explicit socket or server file
 * first, then `<socketDir>/<name>`, then `<authDir>/<name>`.
 */
export async function locateServer(options: LocateOptions): Promise<RendezvousEndpoint> {
  if (options.socketPath) return { kind: 'local', path: options.socketPath }
  if (options.serverFile) return readServerFile(options.serverFile)

  const socketPath = path.isAbsolute(options.name) ? options.name : path.join(options.socketDir, options.name)
  if (await isSocketFile(socketPath)) return { kind: 'local', path: socketPath }

  const serverFile = path.join(options.authDir, path.basename(options.name))
  if (await pathExists(serverFile)) return readServerFile(serverFile)

  throw new ServerUnreachable(options.name, new Error(`no socket at ${socketPath} and no server file at ${serverFile}`))
}

export async function isSocketFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.lstat(filePath)
    return stat.isSocket()
  } catch {
    return false
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
