export type ParsedArgs = {
  flags: Record<string, string | boolean>
  args: string[]
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const BOOLEAN_FLAGS = new Set([
  'n', 'no-wait',
  'e', 'eval',
  'c', 'create-frame',
  't', 'nw', 'tty',
  'q', 'quiet',
  'h', 'help',
])

const FLAG_ALIASES: Record<string, string> = {
  n: 'no-wait',
  e: 'eval',
  c: 'create-frame',
  t: 'tty',
  nw: 'tty',
  q: 'quiet',
  h: 'help',
  d: 'display',
  s: 'socket-name',
  f: 'server-file',
  F: 'frame-parameters',
}

const VALUE_FLAGS = new Set(['display', 'socket-name', 'server-file', 'parent-id', 'frame-parameters', 'eval-at'])

function canonicalKey(key: string): string {
  return FLAG_ALIASES[key] ?? key
}

function canUseAsFlagValue(token: string | undefined): token is string {
  if (token === undefined) return false
  return token !== '--'
}

/**
 * Split argv into flags and positional arguments. Value flags always take the
 * next token, so a display or socket name may start with a dash.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {}
  const args: string[] = []
  let i = 0

  while (i < argv.length) {
    const token = argv[i]

    if (token === '--') {
      args.push(...argv.slice(i + 1))
      break
    }

    if (!token.startsWith('-') || token === '-') {
      args.push(token)
      i += 1
      continue
    }

    const raw = token.startsWith('--') ? token.slice(2) : token.slice(1)
    const eqIndex = raw.indexOf('=')
    if (eqIndex >= 0) {
      flags[canonicalKey(raw.slice(0, eqIndex))] = raw.slice(eqIndex + 1)
      i += 1
      continue
    }

    const key = canonicalKey(raw)
    if (BOOLEAN_FLAGS.has(raw) || !VALUE_FLAGS.has(key)) {
      flags[key] = true
      i += 1
      continue
    }

    const next = argv[i + 1]
    if (!canUseAsFlagValue(next)) {
      throw new UsageError(`option --${key} requires an argument`)
    }
    flags[key] = next
    i += 2
  }

  return { flags, args }
}

export type ClientOptions = {
  noWait: boolean
  evalMode: boolean
  createFrame: boolean
  tty: boolean
  quiet: boolean
  help: boolean
  display?: string
  socketName?: string
  serverFile?: string
  parentId?: string
  frameParameters?: string
  /** Server to evaluate the first argument on, as a remote eval client. */
  evalAt?: string
  args: string[]
}

const KNOWN_FLAGS = new Set([...Object.values(FLAG_ALIASES), ...VALUE_FLAGS])

const stringFlag = (flags: ParsedArgs['flags'], key: string): string | undefined => {
  const value = flags[key]
  return typeof value === 'string' ? value : undefined
}

export function resolveClientOptions(parsed: ParsedArgs): ClientOptions {
  for (const key of Object.keys(parsed.flags)) {
    if (!KNOWN_FLAGS.has(key)) throw new UsageError(`unrecognized option '${key.length === 1 ? '-' : '--'}${key}'`)
  }
  const { flags } = parsed
  return {
    noWait: flags['no-wait'] === true,
    evalMode: flags.eval === true,
    createFrame: flags['create-frame'] === true,
    tty: flags.tty === true,
    quiet: flags.quiet === true,
    help: flags.help === true,
    display: stringFlag(flags, 'display'),
    socketName: stringFlag(flags, 'socket-name'),
    serverFile: stringFlag(flags, 'server-file'),
    parentId: stringFlag(flags, 'parent-id'),
    frameParameters: stringFlag(flags, 'frame-parameters'),
    evalAt: stringFlag(flags, 'eval-at'),
    args: parsed.args,
  }
}

export const USAGE = `Usage: editserve-client [OPTIONS] FILE...
Ask a running edit server to open files or evaluate expressions.

  -n, --no-wait              Return immediately; do not wait for the files
  -e, --eval                 Evaluate the arguments as expressions
  -c, --create-frame         Create a new graphical surface
  -t, -nw, --tty             Open a surface on the current terminal
  -d, --display DISPLAY      Display for a new graphical surface
  -F, --frame-parameters OBJ JSON object of surface parameters
      --parent-id ID         Parent window of a new graphical surface
  -s, --socket-name NAME     Server name or socket path
  -f, --server-file FILE     Server file of a TCP server
      --eval-at NAME         Evaluate one expression on server NAME and print it
  -q, --quiet                Do not print notices
  -h, --help                 Show this help
  +LINE[:COLUMN] FILE        Go to LINE (and COLUMN) in the next FILE
`
