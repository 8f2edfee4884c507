import { parseArgs } from 'node:util'
import { formatError } from '../output.js'
import { readStdin, resolveConfigDir } from '../context.js'
import { createCredentials, saveCredentials } from '../credentials.js'

/** Set the status service login. The password is read from stdin. */
export async function credentialsCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      username: { type: 'string' },
      'config-dir': { type: 'string' },
    },
    strict: true,
  })

  if (values.username === undefined || values.username === '') {
    process.stderr.write('Error: --username is required\n')
    process.stderr.write(
      'Usage: echo "<password>" | witness-rotator credentials --username <name>\n',
    )
    return 1
  }

  try {
    const password = await readStdin()
    if (password.length === 0) {
      process.stderr.write('Error: No password provided on stdin\n')
      return 1
    }
    const credentials = await createCredentials(values.username, password)
    const filePath = await saveCredentials(resolveConfigDir(values['config-dir']), credentials)
    process.stdout.write(`Login for "${values.username}" saved to ${filePath}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
