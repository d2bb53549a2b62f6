#!/usr/bin/env node
import process from 'node:process'
import path from 'node:path'
import { loadConfig, getConfigPath, resolveSettings, type Settings } from './config.js'
import { parseArgs, stringFlag, integerFlag, UsageError, type ParsedArgs } from './args.js'
import { DirectoryOutput, ensureOutputDir, openFileSource, type FileSource } from './files.js'
import { listen, limitFileSize, acceptAll } from './receiver/index.js'
import { sendFile } from './sender/index.js'
import type { Outcome } from './session/index.js'

const EXIT_OK = 0
const EXIT_FAILED = 1
const EXIT_REJECTED = 2

const config = loadConfig()

function printUsage(): void {
  const settings = resolveSettings(config)
  console.log(`
ferry - send one file straight to another machine

Usage:
  ferry <command> [options]

Commands:
  listen                   Receive files until interrupted
    --port <port>          Port to listen on (default: ${settings.port})
    --output <dir>         Directory for received files (default: ${settings.outputDir})
    --max-size <bytes>     Decline offers larger than this
    --overwrite            Replace existing files instead of declining
    --timeout <ms>         Handshake and idle timeout (default: ${settings.timeoutMs})

  send                     Send one file
    --file <path>          File to send
    --to <host>            Receiver address
    --port <port>          Receiver port (default: ${settings.port})
    --name <name>          Name to offer instead of the file's own
    --timeout <ms>         Handshake and idle timeout (default: ${settings.timeoutMs})

  config                   Show current configuration
  help                     Show this help message

Exit codes (send): 0 sent, 1 failed, 2 declined by receiver

Config: ${getConfigPath()}
`)
}

function outcomeExitCode(outcome: Outcome): number {
  switch (outcome.status) {
    case 'completed': return EXIT_OK
    case 'rejected': return EXIT_REJECTED
    case 'failed': return EXIT_FAILED
  }
}

function listenSettings(args: ParsedArgs): Settings {
  const base = resolveSettings(config)
  const maxFileSize = integerFlag(args.flags, 'max-size', 0)
  return {
    port: integerFlag(args.flags, 'port', 1, 65535) ?? base.port,
    outputDir: stringFlag(args.flags, 'output') ?? base.outputDir,
    timeoutMs: integerFlag(args.flags, 'timeout', 1) ?? base.timeoutMs,
    maxFileSize: maxFileSize ?? base.maxFileSize,
    overwrite: args.flags.overwrite === true || base.overwrite
  }
}

async function runListen(args: ParsedArgs): Promise<number> {
  const settings = listenSettings(args)
  const outputDir = path.resolve(settings.outputDir)
  ensureOutputDir(outputDir)

  const controller = new AbortController()
  const shutdown = () => {
    if (!controller.signal.aborted) {
      console.log('')
      console.log('Shutting down...')
      controller.abort()
    }
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  try {
    await listen({
      port: settings.port,
      output: new DirectoryOutput(outputDir),
      timeoutMs: settings.timeoutMs,
      policy: settings.maxFileSize === null ? acceptAll : limitFileSize(settings.maxFileSize),
      overwrite: settings.overwrite
    }, controller.signal)
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    console.error(`Failed to start receiver on port ${settings.port}: ${msg}`)
    return EXIT_FAILED
  } finally {
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
  }

  return EXIT_OK
}

async function runSend(args: ParsedArgs): Promise<number> {
  const settings = resolveSettings(config)
  const file = stringFlag(args.flags, 'file') ?? args.positionals[0]
  const host = stringFlag(args.flags, 'to')
  if (!file || !host) {
    throw new UsageError('send needs --file <path> and --to <host>')
  }

  let source: FileSource
  try {
    source = await openFileSource(file)
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    console.error(`Cannot read ${file}: ${msg}`)
    return EXIT_FAILED
  }

  const outcome = await sendFile({
    host,
    port: integerFlag(args.flags, 'port', 1, 65535) ?? settings.port,
    source,
    fileName: stringFlag(args.flags, 'name'),
    timeoutMs: integerFlag(args.flags, 'timeout', 1) ?? settings.timeoutMs
  })

  return outcomeExitCode(outcome)
}

function showConfig(): void {
  const settings = resolveSettings(config)
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Port: ${config.port ?? '(not set)'}`)
  console.log(`  Output directory: ${config.outputDir ?? '(not set)'}`)
  console.log(`  Timeout: ${config.timeoutMs ?? '(not set)'}`)
  console.log(`  Max file size: ${config.maxFileSize ?? '(not set)'}`)
  console.log(`  Overwrite: ${config.overwrite ?? '(not set)'}`)
  console.log('')
  console.log('Effective settings:')
  console.log(`  port: ${settings.port}`)
  console.log(`  outputDir: ${path.resolve(settings.outputDir)}`)
  console.log(`  timeoutMs: ${settings.timeoutMs}`)
  console.log(`  maxFileSize: ${settings.maxFileSize ?? 'unlimited'}`)
  console.log(`  overwrite: ${settings.overwrite}`)
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2))

  if (args.command === null || args.flags.help === true) {
    printUsage()
    return EXIT_OK
  }

  try {
    switch (args.command) {
      case 'listen':
        return await runListen(args)
      case 'send':
        return await runSend(args)
      case 'config':
        showConfig()
        return EXIT_OK
      case 'help':
        printUsage()
        return EXIT_OK
      default:
        console.error(`Unknown command: ${args.command}`)
        console.error('Run "ferry help" for usage.')
        return EXIT_FAILED
    }
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`)
      console.error('Run "ferry help" for usage.')
      return EXIT_FAILED
    }
    throw err
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error('Fatal error:', err)
    process.exit(1)
  })
