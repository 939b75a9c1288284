export type EditServerErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'PARSE_ERROR'
  | 'EVALUATION_ERROR'
  | 'SERVER_ALREADY_RUNNING'
  | 'SERVER_UNREACHABLE'
  | 'UNREADABLE_RESULT'
  | 'REMOTE_EVAL_ERROR'
  | 'CONFIG_ERROR'

export class EditServerError extends Error {
  readonly code: EditServerErrorCode

  constructor(code: EditServerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** A session on an auth-required endpoint sent anything but the right `-auth <key>`. */
export class AuthenticationFailed extends EditServerError {
  constructor() {
    super('AUTHENTICATION_FAILED', 'Authentication failed')
  }
}

/** Unknown command, missing argument, or malformed argument in a request line. */
export class ParseError extends EditServerError {
  constructor(message: string, readonly token?: string) {
    super('PARSE_ERROR', message)
  }
}

export class EvaluationError extends EditServerError {
  constructor(readonly expression: string, cause: unknown) {
    super('EVALUATION_ERROR', describeError(cause), { cause })
  }
}

export class ServerAlreadyRunning extends EditServerError {
  constructor(readonly endpoint: string) {
    super('SERVER_ALREADY_RUNNING', `A server is already running at ${endpoint}`)
  }
}

export class ServerUnreachable extends EditServerError {
  constructor(readonly endpoint: string, cause?: unknown) {
    super('SERVER_UNREACHABLE', `Cannot reach server at ${endpoint}${cause ? `: ${describeError(cause)}` : ''}`, { cause })
  }
}

export class UnreadableResult extends EditServerError {
  constructor(readonly payload: string, cause?: unknown) {
    super('UNREADABLE_RESULT', `Unreadable result: ${JSON.stringify(payload.slice(0, 200))}`, { cause })
  }
}

/** The remote server answered an eval request with `-error`. */
export class RemoteEvalError extends EditServerError {
  constructor(message: string) {
    super('REMOTE_EVAL_ERROR', message)
  }
}

export class ConfigError extends EditServerError {
  constructor(message: string) {
    super('CONFIG_ERROR', message)
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name
  if (typeof err === 'string') return err
  // Errors thrown inside a vm context are not instances of this realm's Error.
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message
  }
  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    return String(err)
  }
}
