import fs from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { resolveDefaultAuthDir, resolveDefaultSocketDir, DEFAULT_SERVER_NAME } from '../config.js'
import type { LocateOptions } from '../rendezvous.js'
import type { ClientOptions } from './args.js'

const CliConfigFileSchema = z.object({
  socketName: z.string().min(1).optional(),
  serverFile: z.string().min(1).optional(),
  socketDir: z.string().min(1).optional(),
  authDir: z.string().min(1).optional(),
})

type CliConfigFile = z.infer<typeof CliConfigFileSchema>

export function loadConfigFile(homeDir: string = os.homedir()): CliConfigFile {
  const file = path.join(homeDir, '.editserve', 'cli.json')
  if (!fs.existsSync(file)) return {}
  try {
    const parsed = CliConfigFileSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')))
    return parsed.success ? parsed.data : {}
  } catch {
    return {}
  }
}

/**
 * Where to find the server: flags first, then `EDITSERVE_*` variables, then
 * `~/.editserve/cli.json`. A socket name containing a separator is a path.
 */
export function resolveLocateOptions(
  options: Pick<ClientOptions, 'socketName' | 'serverFile'>,
  envVars: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): LocateOptions {
  const file = loadConfigFile(homeDir)
  const socketName = options.socketName || envVars.EDITSERVE_SOCKET_NAME || file.socketName
  const serverFile = options.serverFile || envVars.EDITSERVE_SERVER_FILE || file.serverFile
  const socketDir = envVars.EDITSERVE_SOCKET_DIR || file.socketDir || resolveDefaultSocketDir(envVars)
  const authDir = envVars.EDITSERVE_AUTH_DIR || file.authDir || resolveDefaultAuthDir(homeDir)

  const isPath = socketName !== undefined && socketName.includes(path.sep)
  return {
    name: socketName && !isPath ? socketName : DEFAULT_SERVER_NAME,
    socketDir: path.resolve(socketDir),
    authDir: path.resolve(authDir),
    socketPath: isPath ? path.resolve(socketName) : undefined,
    serverFile: serverFile ? path.resolve(serverFile) : undefined,
  }
}
