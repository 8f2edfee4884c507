import { parseArgs } from 'node:util'
import { RotationService } from 'witness-rotator'
import { formatError } from '../output.js'
import { loadCheckedProfile, resolveConfigDir } from '../context.js'
import { loadCredentials } from '../credentials.js'
import { createStatusServer } from '../server.js'

const DEFAULT_PORT = 5001
const DEFAULT_HOST = '0.0.0.0'

/** Run the HTTP status service until the process is stopped. */
export async function serveCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      port: { type: 'string' },
      host: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  const port = values.port === undefined ? DEFAULT_PORT : Number(values.port)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    process.stderr.write(`Error: invalid --port "${values.port ?? ''}"\n`)
    return 1
  }
  const host = values.host ?? DEFAULT_HOST

  try {
    const configDir = resolveConfigDir(values['config-dir'])
    const credentials = await loadCredentials(configDir)
    const profile = await loadCheckedProfile(configDir)
    const server = createStatusServer(new RotationService(profile), { credentials })

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })
    process.stdout.write(`Status service listening on http://${host}:${String(port)}\n`)

    await new Promise<void>((resolve) => {
      const shutdown = (): void => {
        server.close(() => {
          resolve()
        })
      }
      process.once('SIGINT', shutdown)
      process.once('SIGTERM', shutdown)
    })
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
