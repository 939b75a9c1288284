import { encodeAuthPrefix } from '../../shared/edit-protocol.js'
import { unquoteArgument } from '../../shared/quoting.js'
import { connectToEndpoint, readReplies } from '../remote-eval.js'
import { endpointRequiresAuth, type RendezvousEndpoint } from '../rendezvous.js'
import { processStreams, writeNotice, type OutputStreams } from './output.js'

export type ClientResult = {
  serverPid?: number
  errors: string[]
  windowSystemUnsupported: boolean
  exitCode: number
}

export type SendRequestOptions = {
  quiet?: boolean
  streams?: OutputStreams
  connectTimeoutMs?: number
}

/**
 * Send one request line and relay replies until the server closes the
 * connection. Print chunks never split an escape pair, so each one is
 * unquoted and written as it arrives.
 */
export async function sendRequest(
  endpoint: RendezvousEndpoint,
  requestLine: string,
  options: SendRequestOptions = {},
): Promise<ClientResult> {
  const streams = options.streams ?? processStreams
  const socket = await connectToEndpoint(endpoint, options.connectTimeoutMs)
  const result: ClientResult = { errors: [], windowSystemUnsupported: false, exitCode: 0 }

  const done = readReplies(socket, (reply) => {
    switch (reply.type) {
      case 'pid':
        result.serverPid = reply.pid
        return
      case 'print':
        streams.stdout.write(reply.final ? `${unquoteArgument(reply.text)}\n` : unquoteArgument(reply.text))
        return
      case 'error':
        result.errors.push(reply.message)
        streams.stderr.write(`*ERROR*: ${reply.message}\n`)
        return
      case 'window-system-unsupported':
        result.windowSystemUnsupported = true
        if (!options.quiet) writeNotice('the server does not support a window system', streams)
        return
      case 'unknown':
        if (!options.quiet) writeNotice(`unrecognized reply: ${reply.raw}`, streams)
        return
    }
  })

  socket.write(endpointRequiresAuth(endpoint) ? `${encodeAuthPrefix(endpoint.secret)}${requestLine}` : requestLine)
  await done

  result.exitCode = result.errors.length > 0 ? 1 : 0
  return result
}
