export interface ParsedArgs {
  command: string | null
  flags: Record<string, string | true>
  positionals: string[]
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

// Flags that never take a value
const BOOLEAN_FLAGS = new Set(['overwrite', 'help'])

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | true> = {}
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!

    if (arg.startsWith('--') && arg.length > 2) {
      const eq = arg.indexOf('=')
      if (eq !== -1) {
        flags[arg.slice(2, eq)] = arg.slice(eq + 1)
        continue
      }

      const name = arg.slice(2)
      const next = argv[i + 1]
      if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith('--')) {
        flags[name] = next
        i++
      } else {
        flags[name] = true
      }
      continue
    }

    if (arg === '-h') {
      flags.help = true
      continue
    }

    positionals.push(arg)
  }

  return {
    command: positionals.shift() ?? null,
    flags,
    positionals
  }
}

export function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name]
  if (value === undefined) return undefined
  if (value === true) {
    throw new UsageError(`--${name} requires a value`)
  }
  return value
}

export function integerFlag(
  flags: ParsedArgs['flags'],
  name: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number | undefined {
  const raw = stringFlag(flags, name)
  if (raw === undefined) return undefined

  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`--${name} must be a whole number, got "${raw}"`)
  }
  const value = Number(raw)
  if (value < min || value > max) {
    throw new UsageError(`--${name} must be between ${min} and ${max}`)
  }
  return value
}
