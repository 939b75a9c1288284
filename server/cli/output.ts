export type OutputStreams = {
  stdout: { write(text: string): unknown }
  stderr: { write(text: string): unknown }
}

export const processStreams: OutputStreams = { stdout: process.stdout, stderr: process.stderr }

export function writeText(text: string, streams: OutputStreams = processStreams) {
  if (text.endsWith('\n')) {
    streams.stdout.write(text)
    return
  }
  streams.stdout.write(`${text}\n`)
}

export function writeNotice(message: string, streams: OutputStreams = processStreams) {
  streams.stderr.write(`editserve-client: ${message}\n`)
}

export function writeError(err: unknown, streams: OutputStreams = processStreams) {
  if (err instanceof Error) {
    streams.stderr.write(`editserve-client: ${err.message}\n`)
    return
  }
  streams.stderr.write(`editserve-client: ${String(err)}\n`)
}
