import { z } from 'zod'
import { COMMAND_ARITY, RequestCommand } from '../shared/edit-protocol.js'
import { splitArguments, unquoteArgument } from '../shared/quoting.js'
import { timingSafeCompare } from './auth.js'
import { ParseError } from './errors.js'
import { logger } from './logger.js'

const log = logger.child({ component: 'request-parser' })

export type FilePosition = { line: number; column?: number }

export type FileRequest = { path: string; position?: FilePosition }

export type EnvironmentEntry = { name: string; value: string }

/** Side effects scheduled by a request, run in parse order. */
export type SessionAction = 'suspend' | 'resume'

export type SurfaceHints = {
  tty?: { device: string; type: string }
  windowSystem: boolean
  display?: string
  parentId?: string
}

export type SurfaceRequest =
  | { kind: 'none' }
  | { kind: 'reuse-current'; display?: string }
  | { kind: 'new-text-surface'; device: string; type: string; minimal: boolean }
  | { kind: 'new-graphical-surface'; display?: string; parentId?: string }

/** Everything read from one request line, before a surface has been chosen. */
export type ParsedRequest = {
  tokens: string[]
  wantsNoWait: boolean
  wantsCurrentSurfaceOnly: boolean
  keepSessionAlive: boolean
  files: FileRequest[]
  expressions: string[]
  environment: EnvironmentEntry[]
  directory?: string
  surfaceParameters?: Record<string, unknown>
  actions: SessionAction[]
  surface: SurfaceHints
}

export type RequestPlan = Readonly<{
  tokens: readonly string[]
  wantsNoWait: boolean
  wantsCurrentSurfaceOnly: boolean
  keepSessionAlive: boolean
  files: readonly Readonly<FileRequest>[]
  expressions: readonly string[]
  environment: readonly Readonly<EnvironmentEntry>[]
  directory?: string
  surfaceParameters?: Readonly<Record<string, unknown>>
  actions: readonly SessionAction[]
  surfaceRequest: SurfaceRequest
}>

const SurfaceParametersSchema = z.record(z.unknown())

const POSITION_PATTERN = /^\+(\d+)(?::(\d+))?$/

export function parsePosition(arg: string): FilePosition {
  const match = POSITION_PATTERN.exec(arg)
  if (!match) throw new ParseError('Invalid -position command in client args', arg)
  const line = Number(match[1])
  return match[2] === undefined ? { line } : { line, column: Number(match[2]) }
}

/**
 * Every entry is kept, whatever its shape; the host decides precedence. The
 * name ends at the first `=` after its first character, so Windows entries
 * such as `=C:=C:\dir` keep their leading `=`. An entry without `=` has an
 * empty value.
 */
function parseEnvironmentEntry(arg: string): EnvironmentEntry {
  const eq = arg.indexOf('=', 1)
  if (eq === -1) return { name: arg, value: '' }
  return { name: arg.slice(0, eq), value: arg.slice(eq + 1) }
}

function parseSurfaceParameters(arg: string): Record<string, unknown> {
  let value: unknown
  try {
    value = JSON.parse(arg)
  } catch {
    throw new ParseError('Invalid -frame-parameters literal', arg)
  }
  const parsed = SurfaceParametersSchema.safeParse(value)
  if (!parsed.success || Array.isArray(value)) {
    throw new ParseError('-frame-parameters must be an object literal', arg)
  }
  return parsed.data
}

/** Decode the raw arguments of a line, reversing the wire quoting. */
export function decodeArguments(line: string): string[] {
  return splitArguments(line).map((raw) =>
    unquoteArgument(raw, (warning) => {
      log.warn({ event: 'unquote_unknown_escape', escape: warning.escape, index: warning.index }, 'Unknown escape in request argument')
    }),
  )
}

export type AuthenticationResult =
  | { ok: true; rest: string }
  | { ok: false }

/**
 * Check that `line` opens with `-auth <key>` matching `secret`, and return the
 * remainder of the line, which is the start of the real request.
 */
export function checkAuthentication(line: string, secret: string): AuthenticationResult {
  const match = /^-auth ([!-~]+)(?: |$)/.exec(line)
  if (!match) return { ok: false }
  if (!timingSafeCompare(match[1], secret)) return { ok: false }
  return { ok: true, rest: line.slice(match[0].length) }
}

/**
 * Walk decoded tokens left to right. Each command consumes its own arguments;
 * `-position` applies to the next `-file` only. Any unknown token or missing
 * argument fails the whole request.
 */
export function parseRequestTokens(tokens: string[]): ParsedRequest {
  const request: ParsedRequest = {
    tokens,
    wantsNoWait: false,
    wantsCurrentSurfaceOnly: false,
    keepSessionAlive: false,
    files: [],
    expressions: [],
    environment: [],
    actions: [],
    surface: { windowSystem: false },
  }
  let pendingPosition: FilePosition | undefined

  let i = 0
  while (i < tokens.length) {
    const token = tokens[i]
    const command = RequestCommand.safeParse(token)
    if (!command.success) {
      throw new ParseError(`Unknown command: ${token}`, token)
    }
    const arity = COMMAND_ARITY[command.data]
    const args = tokens.slice(i + 1, i + 1 + arity)
    if (args.length < arity) {
      throw new ParseError(`Missing argument for ${command.data}`, token)
    }
    i += 1 + arity

    switch (command.data) {
      case '-auth':
        // Already authenticated (or trusted) by the time a request is parsed.
        break
      case '-env':
        request.environment.push(parseEnvironmentEntry(args[0]))
        break
      case '-dir':
        request.directory = args[0]
        break
      case '-current-frame':
        request.wantsCurrentSurfaceOnly = true
        break
      case '-frame-parameters':
        request.surfaceParameters = { ...request.surfaceParameters, ...parseSurfaceParameters(args[0]) }
        break
      case '-nowait':
        request.wantsNoWait = true
        break
      case '-display':
        request.surface.display = args[0]
        break
      case '-parent-id':
        request.surface.parentId = args[0]
        break
      case '-position':
        pendingPosition = parsePosition(args[0])
        break
      case '-file':
        request.files.push(pendingPosition ? { path: args[0], position: pendingPosition } : { path: args[0] })
        pendingPosition = undefined
        break
      case '-eval':
        request.expressions.push(args[0])
        break
      case '-window-system':
        request.surface.windowSystem = true
        break
      case '-tty':
        request.surface.tty = { device: args[0], type: args[1] }
        break
      case '-suspend':
        request.keepSessionAlive = true
        request.actions.push('suspend')
        break
      case '-resume':
        request.keepSessionAlive = true
        request.actions.push('resume')
        break
      case '-ignore':
        request.keepSessionAlive = true
        break
    }
  }

  return request
}

export function freezeRequestPlan(request: ParsedRequest, surfaceRequest: SurfaceRequest): RequestPlan {
  return Object.freeze({
    tokens: Object.freeze([...request.tokens]),
    wantsNoWait: request.wantsNoWait,
    wantsCurrentSurfaceOnly: request.wantsCurrentSurfaceOnly,
    keepSessionAlive: request.keepSessionAlive,
    files: Object.freeze(request.files.map((file) => Object.freeze({ ...file }))),
    expressions: Object.freeze([...request.expressions]),
    environment: Object.freeze(request.environment.map((entry) => Object.freeze({ ...entry }))),
    directory: request.directory,
    surfaceParameters: request.surfaceParameters ? Object.freeze({ ...request.surfaceParameters }) : undefined,
    actions: Object.freeze([...request.actions]),
    surfaceRequest: Object.freeze({ ...surfaceRequest }),
  })
}
