import { resolveServerSecret } from './auth.js'
import { endpointFromConfig, type ServerConfig } from './config.js'
import { ConnectionListener } from './connection-listener.js'
import { ProtocolDispatcher } from './dispatcher.js'
import { Executor } from './executor.js'
import { SessionRegistry } from './session-registry.js'
import type { EditorHost } from './editor-host.js'

export type EditServer = {
  host: EditorHost
  registry: SessionRegistry
  listener: ConnectionListener
}

/** Wire host, registry, executor, dispatcher and listener for one server instance. */
export function createEditServer(config: ServerConfig, host: EditorHost, secret: string = resolveServerSecret(config.authKey)): EditServer {
  const registry = new SessionRegistry(host, { errorGraceMs: config.graceMs })
  const executor = new Executor(host, registry)
  const endpoint = endpointFromConfig(config, secret)
  const dispatcher = new ProtocolDispatcher(host, registry, executor, {
    secret: endpoint.kind === 'tcp' ? secret : undefined,
    alwaysUseCurrentSurface: config.alwaysUseCurrentSurface,
    fallbackTtyTypes: config.fallbackTtyTypes,
  })
  const listener = new ConnectionListener({ endpoints: [endpoint], registry, dispatcher })
  return { host, registry, listener }
}
