/**
 * Helpers shared by the CLI commands.
 *
 * @internal
 */

import { ConfigurationError, getDefaultConfigDir, loadProfile, runDoctor } from 'witness-rotator'
import type { ExecutionProfile } from 'witness-rotator'

/** Environment variable overriding the config directory. */
export const CONFIG_DIR_ENV = 'WITNESS_ROTATOR_CONFIG_DIR'

/** Default environment variable holding the stored-request passphrase. */
export const PASSPHRASE_ENV = 'WITNESS_ROTATOR_PASSPHRASE'

/** `--config-dir`, then the environment, then the platform default. */
export function resolveConfigDir(flag: string | undefined): string {
  if (flag !== undefined && flag !== '') return flag
  const fromEnv = process.env[CONFIG_DIR_ENV]
  if (fromEnv !== undefined && fromEnv !== '') return fromEnv
  return getDefaultConfigDir()
}

/** Read all of stdin as UTF-8, without the trailing newline. */
export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    if (chunk instanceof Buffer) {
      chunks.push(chunk)
    } else if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk))
    } else {
      chunks.push(Buffer.from(String(chunk)))
    }
  }
  return Buffer.concat(chunks).toString('utf8').trimEnd()
}

/**
 * Read the passphrase from `envVar`.
 * @throws {@link ConfigurationError} if the variable is unset or empty.
 */
export function readPassphrase(envVar: string): string {
  const value = process.env[envVar]
  if (value === undefined || value === '') {
    throw new ConfigurationError(`Set the passphrase in the ${envVar} environment variable`)
  }
  return value
}

/**
 * Load the profile and run the preflight checks for it.
 * @throws {@link ConfigurationError} listing the next steps if a required check fails.
 */
export async function loadCheckedProfile(configDir: string): Promise<ExecutionProfile> {
  const profile = await loadProfile(configDir)
  const preflight = await runDoctor(profile)
  if (!preflight.ready) {
    throw new ConfigurationError(
      `Preflight checks failed:\n${preflight.nextSteps.map((step) => `  → ${step}`).join('\n')}`,
    )
  }
  return profile
}
