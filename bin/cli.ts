#!/usr/bin/env -S npx tsx
import type { WraithConfig } from '../src/types'
import { readFileSync } from 'node:fs'
import process from 'node:process'
import { CAC } from 'cac'
import { loadWraithConfig, mergeConfig, validateWraithConfig } from '../src/config'
import { ProcessStdin } from '../src/input/stdin'
import { Logger } from '../src/logger'
import { isShellMode } from '../src/session/session-state'
import { WraithShell } from '../src/shell'
import { signalNumber } from '../src/shell/command-executor'
import { onTerminationSignals } from '../src/shell/signals'

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0'
}

const version = readVersion()
const cli = new CAC('wraith')

interface CliOptions {
  verbose?: boolean
  config?: string
  mode?: string
}

async function resolveConfig(options: CliOptions): Promise<WraithConfig> {
  const loaded = await loadWraithConfig({ path: options.config })
  const overrides: Partial<WraithConfig> = {}

  if (options.verbose !== undefined)
    overrides.verbose = options.verbose
  if (options.mode !== undefined) {
    if (!isShellMode(options.mode)) {
      process.stderr.write(`wraith: invalid mode: ${options.mode} (expected one of: shell, nl, ai)\n`)
      process.exit(2)
    }
    overrides.mode = options.mode
  }

  const config = mergeConfig(loaded, overrides)
  const log = new Logger(config.verbose, 'config', config.logging)
  const { valid, errors, warnings } = validateWraithConfig(config)
  for (const warning of warnings)
    log.warn(warning)
  if (!valid) {
    for (const error of errors)
      log.error(error)
    process.exit(2)
  }
  return config
}

/**
 * Abort in-flight work on Ctrl+C, SIGTERM or SIGHUP instead of dying with
 * the children still running. The caller exits once the work has stopped.
 */
function abortOnTermination(): AbortController {
  const controller = new AbortController()
  onTerminationSignals(() => controller.abort())
  return controller
}

// Default command - start the shell, or resolve the arguments once
cli
  .command('[...args]', 'Start the wraith shell, or handle one request and exit', {
    ignoreOptionDefaultValue: true,
  })
  .option('--verbose', 'Enable verbose logging')
  .option('--config <config>', 'Path to config file')
  .option('--mode <mode>', 'Initial mode: shell, nl or ai')
  .action(async (args: string[], options: CliOptions) => {
    const config = await resolveConfig(options)

    if (args.length > 0) {
      const shell = new WraithShell({ config, stdin: new ProcessStdin() })
      const controller = abortOnTermination()
      const resolution = await shell.resolve(args.join(' '), {
        signal: controller.signal,
        onCommand: command => process.stdout.write(`→ ${command}\n`),
        onNote: note => process.stdout.write(`${note}\n`),
      })

      for (const result of resolution.results) {
        process.stdout.write(result.stdout)
        process.stderr.write(result.stderr)
      }
      if (resolution.assistantRequest !== undefined)
        process.stdout.write(`Assistant mode is not available yet (request: ${resolution.assistantRequest})\n`)
      if (resolution.prepared !== undefined) {
        process.stderr.write(`wraith: not run without confirmation: ${resolution.prepared}\n`)
        process.exit(1)
      }
      if (resolution.error) {
        process.stderr.write(`wraith: ${resolution.error}\n`)
        process.exit(resolution.errorKind === 'Interrupted' ? shell.state.lastExitCode : 1)
      }

      process.exit(shell.state.lastExitCode)
    }

    const shell = new WraithShell({ config })
    const terminal = Boolean(process.stdin.isTTY)
    const repl = shell.createRepl({
      input: process.stdin,
      output: process.stdout,
      error: process.stderr,
      terminal,
      colors: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    })

    let received: NodeJS.Signals | undefined
    const dispose = onTerminationSignals((signal) => {
      // Without a terminal readline never sees Ctrl+C, so it arrives here
      if (signal === 'SIGINT' && repl.interrupt())
        return
      received ??= signal
      repl.stop()
    })

    let code: number
    try {
      code = await repl.start()
    }
    finally {
      dispose()
    }
    process.exit(received ? 128 + signalNumber(received) : code)
  })

// Run one command exactly as written, without classification or translation
cli
  .command('exec <command>', 'Execute a single command')
  .option('--verbose', 'Enable verbose logging')
  .option('--config <config>', 'Path to config file')
  .action(async (command: string, options: CliOptions) => {
    const config = await resolveConfig(options)
    const shell = new WraithShell({ config })
    const result = await shell.execute(command, {
      signal: abortOnTermination().signal,
      stream: {
        stdout: chunk => process.stdout.write(chunk),
        stderr: chunk => process.stderr.write(chunk),
      },
    })
    process.exit(result.exitCode)
  })

cli
  .command('check-config', 'Validate the configuration and print the result')
  .option('--config <config>', 'Path to config file')
  .action(async (options: CliOptions) => {
    const config = await loadWraithConfig({ path: options.config })
    const { valid, errors, warnings } = validateWraithConfig(config)
    for (const warning of warnings)
      process.stdout.write(`warning: ${warning}\n`)
    for (const error of errors)
      process.stderr.write(`error: ${error}\n`)
    process.stdout.write(valid ? 'Config is valid\n' : 'Config is invalid\n')
    process.exit(valid ? 0 : 1)
  })

cli.command('version', 'Show the version').action(() => {
  process.stdout.write(`${version}\n`)
})

cli.version(version)
cli.help()
cli.parse()
