#!/usr/bin/env node
/**
 * CLI entry point for witness-rotator.
 *
 * Each subcommand is lazy-loaded via dynamic import(), so only the requested
 * command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
// argv[0]=node, argv[1]=script, argv[2]=subcommand, argv[3..]=commandArgs
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: witness-rotator <command> [options]\n\n' +
      'Commands:\n' +
      '  setup        Write the execution profile\n' +
      '  store        Encrypt and store a rotation request (WIF key on stdin, or --manual)\n' +
      '  run          Rotate using the stored request\n' +
      '  manual       Rotate with a WIF key read from stdin\n' +
      '  launch       Start the local node in listener mode\n' +
      '  stop         Stop the managed node\n' +
      '  doctor       Run preflight checks\n' +
      '  config       Show the execution profile\n' +
      '  credentials  Set the status service login (password on stdin)\n' +
      '  serve        Run the HTTP status service\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'setup': {
      const { setupCommand } = await import('./commands/setup.js')
      return setupCommand(commandArgs)
    }
    case 'store': {
      const { storeCommand } = await import('./commands/store.js')
      return storeCommand(commandArgs)
    }
    case 'run': {
      const { runCommand } = await import('./commands/run.js')
      return runCommand(commandArgs)
    }
    case 'manual': {
      const { manualCommand } = await import('./commands/manual.js')
      return manualCommand(commandArgs)
    }
    case 'launch': {
      const { launchCommand } = await import('./commands/launch.js')
      return launchCommand(commandArgs)
    }
    case 'stop': {
      const { stopCommand } = await import('./commands/stop.js')
      return stopCommand(commandArgs)
    }
    case 'doctor': {
      const { doctorCommand } = await import('./commands/doctor.js')
      return doctorCommand(commandArgs)
    }
    case 'config': {
      const { configCommand } = await import('./commands/config.js')
      return configCommand(commandArgs)
    }
    case 'credentials': {
      const { credentialsCommand } = await import('./commands/credentials.js')
      return credentialsCommand(commandArgs)
    }
    case 'serve': {
      const { serveCommand } = await import('./commands/serve.js')
      return serveCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
