#!/usr/bin/env node
import { RemoteEvalClient } from '../remote-eval.js'
import { locateServer } from '../rendezvous.js'
import { parseArgs, resolveClientOptions, USAGE, UsageError } from './args.js'
import { sendRequest } from './client.js'
import { resolveLocateOptions } from './config.js'
import { writeError, writeText } from './output.js'
import { buildRequestLine } from './request.js'

async function main() {
  const options = resolveClientOptions(parseArgs(process.argv.slice(2)))
  if (options.help) {
    writeText(USAGE)
    return
  }

  if (options.evalAt) {
    const expression = options.args[0]
    if (!expression) throw new UsageError('--eval-at requires an expression')
    const locate = resolveLocateOptions({ socketName: options.evalAt, serverFile: options.serverFile })
    const client = await RemoteEvalClient.locate(locate)
    writeText(await client.evaluateText(expression))
    return
  }

  const requestLine = buildRequestLine(options, {
    cwd: process.cwd(),
    env: process.env,
    ttyDevice: process.stdin.isTTY ? '/dev/tty' : undefined,
  })
  const endpoint = await locateServer(resolveLocateOptions(options))
  const result = await sendRequest(endpoint, requestLine, { quiet: options.quiet })
  process.exitCode = result.exitCode
}

main().catch((err) => {
  writeError(err)
  if (err instanceof UsageError) process.stderr.write(`Try 'editserve-client --help' for more information.\n`)
  process.exitCode = 1
})
