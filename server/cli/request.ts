import path from 'path'
import { encodeRequestLine, type RequestArgument } from '../../shared/edit-protocol.js'
import { UsageError, type ClientOptions } from './args.js'

export type RequestEnvironment = {
  cwd: string
  env: NodeJS.ProcessEnv
  /** Terminal device, when running on one. */
  ttyDevice?: string
}

const POSITION_ARG = /^\+\d+(?::\d+)?$/

/**
 * Translate client options into the commands of one request. The whole
 * environment and working directory travel with every request so the server
 * can act on the client's behalf.
 */
export function buildRequest(options: ClientOptions, context: RequestEnvironment): RequestArgument[] {
  const items: RequestArgument[] = []

  for (const [name, value] of Object.entries(context.env)) {
    if (value !== undefined) items.push({ command: '-env', args: [`${name}=${value}`] })
  }
  items.push({ command: '-dir', args: [withTrailingSeparator(context.cwd)] })

  if (options.noWait) items.push({ command: '-nowait' })
  if (options.display) items.push({ command: '-display', args: [options.display] })
  if (options.parentId) items.push({ command: '-parent-id', args: [options.parentId] })
  if (options.frameParameters) items.push({ command: '-frame-parameters', args: [options.frameParameters] })

  if (options.tty) {
    const type = context.env.TERM
    if (!type) throw new UsageError('unknown terminal type; set TERM')
    items.push({ command: '-tty', args: [context.ttyDevice ?? '/dev/tty', type] })
  } else if (options.createFrame) {
    items.push({ command: '-window-system' })
  } else {
    items.push({ command: '-current-frame' })
  }

  if (options.evalMode) {
    for (const expression of options.args) items.push({ command: '-eval', args: [expression] })
    return items
  }

  let sawFile = false
  for (const arg of options.args) {
    if (POSITION_ARG.test(arg)) {
      items.push({ command: '-position', args: [arg] })
      continue
    }
    items.push({ command: '-file', args: [path.resolve(context.cwd, arg)] })
    sawFile = true
  }

  if (!sawFile && !options.tty && !options.createFrame) {
    throw new UsageError('file name or argument required')
  }
  return items
}

export function buildRequestLine(options: ClientOptions, context: RequestEnvironment): string {
  return encodeRequestLine(buildRequest(options, context))
}

function withTrailingSeparator(dir: string): string {
  return dir.endsWith(path.sep) ? dir : `${dir}${path.sep}`
}
