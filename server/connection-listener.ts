import fs from 'fs/promises'
import net from 'net'
import path from 'path'
import { nanoid } from 'nanoid'
import { ClientSession } from './client-session.js'
import { ServerAlreadyRunning } from './errors.js'
import { logger, withLogContext } from './logger.js'
import {
  describeEndpoint,
  endpointRequiresAuth,
  isErrnoException,
  readServerFile,
  removeRendezvousFile,
  writeServerFile,
  type LocalEndpoint,
  type RendezvousEndpoint,
  type TcpEndpoint,
} from './rendezvous.js'
import { formatPidLine } from './reply-framer.js'
import type { ProtocolDispatcher } from './dispatcher.js'
import type { SessionRegistry } from './session-registry.js'

const log = logger.child({ component: 'connection-listener' })

const PROBE_TIMEOUT_MS = 1000

export type ConnectionListenerOptions = {
  endpoints: RendezvousEndpoint[]
  registry: SessionRegistry
  dispatcher: ProtocolDispatcher
  /** Sent in the `-emacs-pid` greeting. Defaults to this process. */
  pid?: number
}

type BoundEndpoint = {
  endpoint: RendezvousEndpoint
  server: net.Server
  /** Files to remove on stop: the socket or the published server file. */
  ownedFiles: string[]
}

function listen(server: net.Server, target: net.ListenOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening)
      reject(err)
    }
    const onListening = () => {
      server.off('error', onError)
      resolve()
    }
    server.once('error', onError)
    server.once('listening', onListening)
    server.listen(target)
  })
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) log.debug({ err }, 'Listening socket already closed')
      resolve()
    })
  })
}

/** Resolves true when something accepts a connection at `target`. */
export function probeEndpoint(target: net.NetConnectOpts, timeoutMs: number = PROBE_TIMEOUT_MS): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection(target)
    const finish = (alive: boolean) => {
      clearTimeout(timer)
      socket.destroy()
      resolve(alive)
    }
    const timer = setTimeout(() => finish(false), timeoutMs)
    socket.once('connect', () => finish(true))
    socket.once('error', () => finish(false))
  })
}

/**
 * Binds every configured endpoint and turns each accepted connection into a
 * registered `ClientSession`. Reads one request line per read event; lines
 * already buffered wait for the next read.
 */
export class ConnectionListener {
  private bound: BoundEndpoint[] = []
  private sockets = new Set<net.Socket>()
  private started = false
  private stopping: Promise<void> | null = null
  private readonly pid: number

  constructor(private options: ConnectionListenerOptions) {
    this.pid = options.pid ?? process.pid
  }

  /** Endpoints as actually bound; TCP ports chosen by the OS are filled in. */
  boundEndpoints(): RendezvousEndpoint[] {
    return this.bound.map((entry) => entry.endpoint)
  }

  async start(): Promise<RendezvousEndpoint[]> {
    if (this.started) throw new Error('Connection listener already started')
    this.started = true
    try {
      for (const endpoint of this.options.endpoints) {
        this.bound.push(endpoint.kind === 'local' ? await this.bindLocal(endpoint) : await this.bindTcp(endpoint))
      }
    } catch (err) {
      // Partial start: release whatever was bound so nothing is accepted.
      await Promise.all(this.bound.map((entry) => this.release(entry)))
      this.bound = []
      throw err
    }
    this.options.registry.attach()
    this.options.registry.on('session.idle', this.onSessionIdle)
    return this.boundEndpoints()
  }

  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown()
    return this.stopping
  }

  private async shutdown(): Promise<void> {
    log.info({ event: 'listener_stopping', sessions: this.options.registry.size }, 'Stopping connection listener')
    await this.options.registry.closeAll('server-stop')
    this.options.registry.detach()
    this.options.registry.off('session.idle', this.onSessionIdle)
    for (const socket of this.sockets) socket.destroy()
    await Promise.all(this.bound.map((entry) => this.release(entry)))
    this.bound = []
    log.info({ event: 'listener_stopped' }, 'Connection listener stopped')
  }

  private async release(entry: BoundEndpoint): Promise<void> {
    await closeServer(entry.server)
    for (const file of entry.ownedFiles) {
      try {
        await removeRendezvousFile(file)
      } catch (err) {
        log.warn({ err, file }, 'Failed to remove rendezvous file')
      }
    }
  }

  private createServer(endpoint: RendezvousEndpoint): net.Server {
    const server = net.createServer((socket) => {
      // A TCP endpoint bound to port 0 learns its real port after listening.
      const bound = this.bound.find((entry) => entry.server === server)
      this.accept(socket, bound ? bound.endpoint : endpoint)
    })
    return server
  }

  private async bindLocal(endpoint: LocalEndpoint): Promise<BoundEndpoint> {
    await fs.mkdir(path.dirname(endpoint.path), { recursive: true, mode: 0o700 })
    const server = this.createServer(endpoint)
    try {
      await listen(server, { path: endpoint.path })
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EADDRINUSE') throw err
      if (await probeEndpoint({ path: endpoint.path })) {
        throw new ServerAlreadyRunning(endpoint.path)
      }
      log.warn({ event: 'stale_socket_removed', path: endpoint.path }, 'Removing socket left by a dead server')
      await removeRendezvousFile(endpoint.path)
      await listen(server, { path: endpoint.path })
    }
    log.info({ event: 'listener_bound', endpoint: endpoint.path }, 'Listening on local socket')
    return { endpoint, server, ownedFiles: [endpoint.path] }
  }

  private async bindTcp(endpoint: TcpEndpoint): Promise<BoundEndpoint> {
    if (endpoint.serverFile) await this.refuseIfPublishedServerAlive(endpoint.serverFile)

    const server = this.createServer(endpoint)
    try {
      await listen(server, { host: endpoint.host, port: endpoint.port })
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EADDRINUSE') {
        throw new ServerAlreadyRunning(describeEndpoint(endpoint))
      }
      throw err
    }

    const address = server.address()
    const port = address !== null && typeof address === 'object' ? address.port : endpoint.port
    const actual: TcpEndpoint = { ...endpoint, port }
    const ownedFiles: string[] = []
    if (actual.serverFile) {
      try {
        await writeServerFile(actual.serverFile, actual)
      } catch (err) {
        await closeServer(server)
        throw err
      }
      ownedFiles.push(actual.serverFile)
    }
    log.info({ event: 'listener_bound', endpoint: describeEndpoint(actual), serverFile: actual.serverFile }, 'Listening on TCP')
    return { endpoint: actual, server, ownedFiles }
  }

  private async refuseIfPublishedServerAlive(serverFile: string): Promise<void> {
    let published: TcpEndpoint
    try {
      published = await readServerFile(serverFile)
    } catch {
      // Missing or unreadable: nothing to protect, it will be overwritten.
      return
    }
    if (await probeEndpoint({ host: published.host, port: published.port })) {
      throw new ServerAlreadyRunning(describeEndpoint(published))
    }
    log.info({ event: 'stale_server_file', serverFile }, 'Replacing server file left by a dead server')
  }

  private accept(socket: net.Socket, endpoint: RendezvousEndpoint): void {
    if (this.stopping) {
      socket.destroy()
      return
    }
    const { registry } = this.options
    const session = new ClientSession({
      connection: socket,
      endpoint,
      authenticated: !endpointRequiresAuth(endpoint),
      connectionId: nanoid(),
      remoteAddress: socket.remoteAddress,
    })
    this.sockets.add(socket)
    registry.register(session)

    const context = { connectionId: session.connectionId, sessionId: session.id, endpoint: session.endpointName }
    withLogContext(context, () => {
      log.info(
        { event: 'session_accepted', remoteAddress: session.remoteAddress, authenticated: session.authenticated, sessionCount: registry.size },
        'Client connected',
      )
    })

    socket.on('data', (chunk: Buffer) => {
      session.appendInput(chunk)
      this.readLine(session)
    })
    socket.on('error', (err) => log.debug({ err, sessionId: session.id }, 'Client socket error'))
    socket.on('close', () => {
      this.sockets.delete(socket)
      void registry.teardown(session, 'remote-disconnect')
    })

    session.send(formatPidLine(this.pid))
  }

  /** A deferred request finished outside a read; serve a read that waited on it. */
  private onSessionIdle = (session: ClientSession): void => {
    if (!session.readPending || !session.isOpen) return
    session.readPending = false
    this.readLine(session)
  }

  /**
   * Serve one buffered line, unless a request is running or deferred for this
   * session. Then the read is remembered and served once it settles.
   */
  private readLine(session: ClientSession): void {
    if (session.inFlight || session.hasContinuation) {
      session.readPending = true
      return
    }
    const line = session.takeLine()
    if (line === null) return
    const context = { connectionId: session.connectionId, sessionId: session.id, endpoint: session.endpointName }
    withLogContext(context, () => session.exclusive(() => this.handleLine(session, line)))
      .then(() => this.onSessionIdle(session))
      .catch((err) => {
        log.error({ err, sessionId: session.id }, 'Failed to finish client request')
      })
  }

  private async handleLine(session: ClientSession, line: string): Promise<void> {
    try {
      await this.options.dispatcher.handleLine(session, line)
    } catch (err) {
      await this.options.registry.abort(session, err)
    }
  }
}
