/**
 * HTTP status service for rotations.
 *
 * Routes (all behind HTTP Basic auth):
 *   POST /start     - Start a rotation in the background
 *   GET  /progress  - Server-sent events of the latest run, history first
 *   GET  /get-keys  - Keys produced by the latest run
 *   GET  /config    - Summary of the execution profile
 *   GET  /health    - Liveness check
 *
 * @internal
 */

import * as http from 'node:http'
import { formatEvent, RotationInProgressError } from 'witness-rotator'
import type { RotationService } from 'witness-rotator'
import { verifyCredentials } from './credentials.js'
import type { UiCredentials } from './credentials.js'

/** Largest request body accepted by `POST /start`. */
const MAX_BODY_BYTES = 64 * 1024

export interface StatusServerOptions {
  credentials: UiCredentials
  /** Receives request errors. Defaults to stderr. */
  log?: ((message: string) => void) | undefined
}

class BadRequestError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BadRequestError'
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' })
  res.end(JSON.stringify(body))
}

function sendError(res: http.ServerResponse, status: number, message: string): void {
  sendJson(res, status, { status: 'error', message })
}

/** Decode an `Authorization: Basic` header into its user and password. */
export function parseBasicAuth(
  header: string | undefined,
): { username: string; password: string } | undefined {
  if (header?.startsWith('Basic ') !== true) return undefined
  const decoded = Buffer.from(header.slice('Basic '.length), 'base64').toString('utf8')
  const colon = decoded.indexOf(':')
  if (colon < 0) return undefined
  return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) }
}

async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = []
  let size = 0
  for await (const chunk of req) {
    const buf = chunk instanceof Buffer ? chunk : Buffer.from(String(chunk))
    size += buf.length
    if (size > MAX_BODY_BYTES) {
      throw new BadRequestError('Request body is too large.')
    }
    chunks.push(buf)
  }
  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf8'))
  } catch {
    throw new BadRequestError('Request body must be JSON.')
  }
}

/** Create the status server. The caller decides where it listens. */
export function createStatusServer(
  service: RotationService,
  options: StatusServerOptions,
): http.Server {
  const log =
    options.log ??
    ((message: string) => {
      process.stderr.write(`${message}\n`)
    })

  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost')
    const path = url.pathname

    try {
      const login = parseBasicAuth(req.headers.authorization)
      if (
        login === undefined ||
        !(await verifyCredentials(options.credentials, login.username, login.password))
      ) {
        res.writeHead(401, {
          'Content-Type': 'application/json',
          'WWW-Authenticate': 'Basic realm="witness-rotator"',
        })
        res.end(JSON.stringify({ status: 'error', message: 'Authentication required.' }))
        return
      }

      if (path === '/health' && req.method === 'GET') {
        sendJson(res, 200, { status: 'ok' })
      } else if (path === '/start' && req.method === 'POST') {
        await handleStart(req, res, service)
      } else if (path === '/progress' && req.method === 'GET') {
        handleProgress(req, res, service)
      } else if (path === '/get-keys' && req.method === 'GET') {
        handleGetKeys(res, service)
      } else if (path === '/config' && req.method === 'GET') {
        handleConfig(res, service)
      } else {
        sendError(res, 404, 'Not found.')
      }
    } catch (err) {
      if (err instanceof BadRequestError) {
        sendError(res, 400, err.message)
        return
      }
      log(`Request error on ${path}: ${err instanceof Error ? err.message : String(err)}`)
      if (!res.headersSent) {
        sendError(res, 500, 'Internal server error.')
      } else {
        res.end()
      }
    }
  })
}

/**
 * POST /start `{ account_name, url?, wif_key }`
 */
async function handleStart(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  service: RotationService,
): Promise<void> {
  if (service.current !== undefined) {
    sendError(res, 400, 'A process is already running.')
    return
  }

  const body = await readJsonBody(req)
  const account = isObject(body) ? body.account_name : undefined
  const wif = isObject(body) ? body.wif_key : undefined
  const witnessUrl = isObject(body) ? body.url : undefined
  if (typeof account !== 'string' || account === '' || typeof wif !== 'string' || wif === '') {
    sendError(res, 400, 'Account name and WIF key are required.')
    return
  }

  try {
    service.start({ account, wif, url: typeof witnessUrl === 'string' ? witnessUrl : '' })
  } catch (err) {
    // Another request may have started a run while the body was being read.
    if (err instanceof RotationInProgressError) {
      sendError(res, 400, 'A process is already running.')
      return
    }
    throw err
  }
  sendJson(res, 200, { status: 'success', message: 'Process started.' })
}

/**
 * GET /progress
 *
 * One `data:` frame per event. The response ends after the sentinel, or
 * when the client goes away.
 */
function handleProgress(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  service: RotationService,
): void {
  const run = service.lastRun
  if (run === undefined) {
    sendError(res, 404, 'No process has been started.')
    return
  }

  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  })
  const unsubscribe = run.feed.subscribe((event) => {
    res.write(`data: ${formatEvent(event)}\n\n`)
    if (event.sentinel !== undefined) {
      res.end()
    }
  })
  req.on('close', unsubscribe)
}

/**
 * GET /get-keys
 */
function handleGetKeys(res: http.ServerResponse, service: RotationService): void {
  const keys = service.getKeys()
  if (keys === undefined) {
    sendError(res, 404, 'No keys available or process was not successful.')
    return
  }
  sendJson(res, 200, {
    status: 'success',
    keys: { pub_key: keys.publicKey, wif_key: keys.privateKey },
  })
}

/**
 * GET /config
 */
function handleConfig(res: http.ServerResponse, service: RotationService): void {
  const { profile } = service
  sendJson(res, 200, {
    status: 'success',
    config: {
      use_docker: profile.backend === 'docker',
      local_node: profile.localNode,
      configured: true,
    },
  })
}
