/**
 * Spawn wrappers for the external node, wallet and container tooling.
 *
 * None of these reject on a non-zero exit code: callers interpret exit
 * status and output text themselves. A missing or non-executable binary is a
 * {@link ConfigurationError}.
 */

import { spawn } from 'node:child_process'
import * as readline from 'node:readline'
import { PassThrough } from 'node:stream'
import { ConfigurationError } from '../errors.js'

/** Options for command execution. */
export interface ExecCommandOptions {
  /** Input to write to stdin */
  stdin?: string | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
}

/** Options for {@link execInteractive}. */
export interface InteractiveOptions {
  /**
   * Longest time to wait before writing input. Input is written earlier if
   * `readyPattern` shows up on stdout.
   */
  settleMs: number
  /** Prompt text that signals the process is ready for input. */
  readyPattern?: string | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
}

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/** A long-running process started by {@link spawnDetached}. */
export interface DetachedProcess {
  pid: number | undefined
  /** Whether the process was still running once the settle delay elapsed. */
  alive: boolean
}

/** Merged stdout/stderr of a running process, one line at a time. */
export interface LineStream extends AsyncIterable<string> {
  /** Stop reading and terminate the process if it is still running. */
  close(): void
}

/**
 * The subset of this module the wallet client depends on, so a scripted
 * implementation can stand in for real processes.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options?: ExecCommandOptions): Promise<ExecCommandResult>
  runInteractive(
    command: string,
    args: string[],
    input: string,
    options: InteractiveOptions,
  ): Promise<ExecCommandResult>
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function toSpawnError(err: unknown, command: string): Error {
  if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'EACCES')) {
    return new ConfigurationError(`Cannot execute ${command}: ${err.code}`)
  }
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Execute a command and return stdout.
 * @throws Error if the command exits with a non-zero code.
 */
export async function execCommand(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<string> {
  const result = await execCommandFull(command, args, options)
  if (result.exitCode !== 0) {
    throw new Error(`Command failed with exit code ${String(result.exitCode)}: ${result.stderr}`)
  }
  return result.stdout.trim()
}

/**
 * Execute a command and return the full result.
 */
export function execCommandFull(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: [options?.stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''
    let timer: ReturnType<typeof setTimeout> | undefined

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options?.stdin !== undefined && proc.stdin) {
      proc.stdin.on('error', (err) => {
        stderr += `\n[stdin] ${err.message}`
      })
      proc.stdin.write(options.stdin)
      proc.stdin.end()
    }

    if (options?.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(options.timeoutMs)}ms`))
      }, options.timeoutMs)
    }

    proc.on('close', (code) => {
      clearTimeout(timer)
      resolve({ stdout, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      clearTimeout(timer)
      reject(toSpawnError(error, command))
    })
  })
}

/**
 * Run an interactive command-line program: start it, wait for it to become
 * ready, write `input` to stdin, then wait for it to exit.
 *
 * @remarks
 * The wallet has no explicit ready signal. Input is written as soon as
 * `readyPattern` appears on stdout, or after `settleMs` at the latest, so the
 * command sequence reaches the program in order either way.
 */
export function execInteractive(
  command: string,
  args: string[],
  input: string,
  options: InteractiveOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] })
    let stdout = ''
    let stderr = ''
    let written = false
    let timeoutTimer: ReturnType<typeof setTimeout> | undefined

    const writeInput = (): void => {
      if (written) return
      written = true
      clearTimeout(settleTimer)
      proc.stdin.end(input)
    }

    const settleTimer = setTimeout(writeInput, options.settleMs)

    proc.stdin.on('error', (err) => {
      stderr += `\n[stdin] ${err.message}`
    })

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString()
      if (options.readyPattern !== undefined && stdout.includes(options.readyPattern)) {
        writeInput()
      }
    })

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options.timeoutMs !== undefined) {
      timeoutTimer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(options.timeoutMs)}ms`))
      }, options.timeoutMs)
    }

    proc.on('close', (code) => {
      clearTimeout(settleTimer)
      clearTimeout(timeoutTimer)
      resolve({ stdout, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      clearTimeout(settleTimer)
      clearTimeout(timeoutTimer)
      reject(toSpawnError(error, command))
    })
  })
}

/**
 * Start a long-running process detached from this one, discarding its
 * output, and report whether it survived the first `settleMs`.
 */
export function spawnDetached(
  command: string,
  args: string[],
  options: { settleMs: number },
): Promise<DetachedProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' })
    let exited = false

    const timer = setTimeout(() => {
      child.unref()
      resolve({ pid: child.pid, alive: !exited })
    }, options.settleMs)

    child.on('exit', () => {
      exited = true
    })

    child.on('error', (error) => {
      clearTimeout(timer)
      reject(toSpawnError(error, command))
    })
  })
}

/**
 * Follow the merged stdout and stderr of a command line by line.
 *
 * Iteration ends when the process closes both streams. Spawn failures surface
 * as a rejection from the iterator.
 */
export function followLines(command: string, args: string[]): LineStream {
  const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
  const merged = new PassThrough()
  let openStreams = 2
  const onEnd = (): void => {
    openStreams -= 1
    if (openStreams === 0) merged.end()
  }

  proc.stdout.pipe(merged, { end: false })
  proc.stderr.pipe(merged, { end: false })
  proc.stdout.on('end', onEnd)
  proc.stderr.on('end', onEnd)
  proc.on('error', (error) => {
    merged.destroy(toSpawnError(error, command))
  })

  const rl = readline.createInterface({ input: merged, crlfDelay: Infinity })

  return {
    [Symbol.asyncIterator]: () => rl[Symbol.asyncIterator](),
    close: () => {
      rl.close()
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill('SIGTERM')
      }
    },
  }
}

/** The real-process implementation of {@link ProcessRunner}. */
export const defaultRunner: ProcessRunner = {
  run: execCommandFull,
  runInteractive: execInteractive,
}
