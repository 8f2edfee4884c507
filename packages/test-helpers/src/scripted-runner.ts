/**
 * Scripted process runner for testing wallet interactions.
 */

import type {
  ExecCommandOptions,
  ExecCommandResult,
  InteractiveOptions,
  Keypair,
  ProcessRunner,
} from 'witness-rotator'

/**
 * A process invocation recorded by {@link ScriptedProcessRunner}.
 * @public
 */
export interface RecordedCall {
  command: string
  args: string[]
  /** Text written to stdin, if any. */
  input: string | undefined
  interactive: boolean
}

/**
 * Selects which calls a rule answers. A string or RegExp is tested against
 * the command line followed by the stdin text.
 * @public
 */
export type CallMatcher = string | RegExp | ((call: RecordedCall) => boolean)

/**
 * A canned response, or a function computing one. An `Error` makes the call
 * reject.
 * @public
 */
export type ScriptedReply =
  | Partial<ExecCommandResult>
  | Error
  | ((call: RecordedCall) => Partial<ExecCommandResult>)

interface Rule {
  matcher: CallMatcher
  reply: ScriptedReply
  remaining: number
}

function describeCall(call: RecordedCall): string {
  return `${[call.command, ...call.args].join(' ')}\n${call.input ?? ''}`
}

function matches(matcher: CallMatcher, call: RecordedCall): boolean {
  if (typeof matcher === 'function') return matcher(call)
  const text = describeCall(call)
  return typeof matcher === 'string' ? text.includes(matcher) : matcher.test(text)
}

/**
 * A `ProcessRunner` that answers from a list of scripted rules instead of
 * starting processes.
 *
 * @remarks
 * Rules are tried in the order they were added; the first one that matches
 * and has uses left answers the call. A call no rule answers rejects, so a
 * test never passes by accident on an unscripted interaction.
 *
 * @example
 * ```ts
 * const runner = new ScriptedProcessRunner()
 *   .on('get_witness', { stdout: '{"id":"1.6.7"}' })
 *   .on('--suggest-brain-key', { stdout: '{"pub_key":"PUB1","wif_priv_key":"WIF1"}' })
 * ```
 *
 * @public
 */
export class ScriptedProcessRunner implements ProcessRunner {
  /** Every call received, in order. */
  readonly calls: RecordedCall[] = []
  readonly #rules: Rule[] = []

  /**
   * Add a rule.
   * @param times - How many calls the rule answers. Defaults to unlimited.
   */
  on(matcher: CallMatcher, reply: ScriptedReply, times = Number.POSITIVE_INFINITY): this {
    this.#rules.push({ matcher, reply, remaining: times })
    return this
  }

  run(command: string, args: string[], options?: ExecCommandOptions): Promise<ExecCommandResult> {
    return this.#answer({ command, args, input: options?.stdin, interactive: false })
  }

  runInteractive(
    command: string,
    args: string[],
    input: string,
    _options: InteractiveOptions,
  ): Promise<ExecCommandResult> {
    return this.#answer({ command, args, input, interactive: true })
  }

  /** Calls whose stdin contained `text`. */
  callsWithInput(text: string): RecordedCall[] {
    return this.calls.filter((call) => call.input?.includes(text) === true)
  }

  #answer(call: RecordedCall): Promise<ExecCommandResult> {
    this.calls.push(call)
    const rule = this.#rules.find((r) => r.remaining > 0 && matches(r.matcher, call))
    if (rule === undefined) {
      return Promise.reject(new Error(`No scripted response for: ${describeCall(call)}`))
    }
    rule.remaining -= 1

    const reply = typeof rule.reply === 'function' ? rule.reply(call) : rule.reply
    if (reply instanceof Error) {
      return Promise.reject(reply)
    }
    return Promise.resolve({
      stdout: reply.stdout ?? '',
      stderr: reply.stderr ?? '',
      exitCode: reply.exitCode ?? 0,
    })
  }
}

/**
 * Wallet behaviour for {@link scriptWallet}.
 * @public
 */
export interface WalletScenario {
  /** Witness id returned by `get_witness`. Defaults to `1.6.7`. */
  witnessId?: string | undefined
  /** Output of key generation. Defaults to a parsable keypair. */
  keypair?: Keypair | undefined
  /** Replace the `get_witness` stdout entirely. */
  verifyStdout?: string | undefined
  /** Replace the key generation stdout entirely. */
  keygenStdout?: string | undefined
  /** Stdout and stderr of `update_witness`. Defaults to a clean response. */
  authorize?: Partial<ExecCommandResult> | undefined
}

/**
 * Script the three wallet interactions of a rotation on `runner`.
 * @public
 */
export function scriptWallet(
  runner: ScriptedProcessRunner,
  scenario: WalletScenario = {},
): ScriptedProcessRunner {
  const witnessId = scenario.witnessId ?? '1.6.7'
  const keypair = scenario.keypair ?? { publicKey: 'PUB1', privateKey: 'WIF1' }
  return runner
    .on('get_witness', {
      stdout:
        scenario.verifyStdout ??
        `new >>> get_witness\n{"id":"${witnessId}","witness_account":"1.2.100"}\n`,
    })
    .on('--suggest-brain-key', {
      stdout:
        scenario.keygenStdout ??
        JSON.stringify({
          brain_priv_key: 'TEST BRAIN KEY WORDS',
          wif_priv_key: keypair.privateKey,
          pub_key: keypair.publicKey,
        }),
    })
    .on('update_witness', scenario.authorize ?? { stdout: 'locked >>> update_witness\n{}\n' })
}
