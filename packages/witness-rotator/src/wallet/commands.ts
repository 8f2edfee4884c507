/**
 * Line-oriented wallet command scripts.
 */

/** A wallet command name followed by its arguments. */
export type WalletCommand = readonly [name: string, ...args: (string | boolean)[]]

/**
 * Render one argument. Strings become JSON string literals, which the wallet
 * parses as quoted strings; booleans are written bare.
 */
export function renderArgument(value: string | boolean): string {
  return typeof value === 'boolean' ? String(value) : JSON.stringify(value)
}

/** Render commands as newline-terminated lines. */
export function renderScript(commands: readonly WalletCommand[]): string {
  return commands
    .map(([name, ...args]) => [name, ...args.map(renderArgument)].join(' ') + '\n')
    .join('')
}

/** Unlock a fresh wallet file and import the account's current key. */
function unlockAndImport(password: string, account: string, wif: string): WalletCommand[] {
  return [
    ['set_password', password],
    ['unlock', password],
    ['import_key', account, wif],
  ]
}

export function verifyKeyScript(password: string, account: string, wif: string): string {
  return renderScript([
    ...unlockAndImport(password, account, wif),
    ['get_witness', account],
    ['quit'],
  ])
}

export function authorizeKeyScript(
  password: string,
  account: string,
  wif: string,
  url: string,
  newPublicKey: string,
): string {
  return renderScript([
    ...unlockAndImport(password, account, wif),
    ['update_witness', account, url, newPublicKey, true],
    ['quit'],
  ])
}

export function getInfoScript(): string {
  return renderScript([['get_info'], ['quit']])
}
