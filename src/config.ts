import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

export interface Config {
  port?: number
  outputDir?: string
  timeoutMs?: number
  maxFileSize?: number
  overwrite?: boolean
}

export interface Settings {
  port: number
  outputDir: string
  timeoutMs: number
  maxFileSize: number | null
  overwrite: boolean
}

export interface ConfigValidationError {
  field: string
  message: string
}

export const DEFAULT_PORT = 7878
export const DEFAULT_TIMEOUT_MS = 30_000

const CONFIG_DIR = path.join(os.homedir(), '.ferry')
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')

export function getConfigPath(): string {
  return CONFIG_FILE
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function validatePort(port: unknown): string | null {
  if (typeof port !== 'number') return 'Port must be a number'
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return 'Port must be an integer between 1 and 65535'
  }
  return null
}

export function validateConfig(config: unknown): ConfigValidationError[] {
  const errors: ConfigValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ field: 'config', message: 'Config must be an object' })
    return errors
  }

  const c = config

  if (c.port !== undefined) {
    const portError = validatePort(c.port)
    if (portError) {
      errors.push({ field: 'port', message: portError })
    }
  }

  if (c.outputDir !== undefined) {
    if (typeof c.outputDir !== 'string') {
      errors.push({ field: 'outputDir', message: 'Output directory must be a string' })
    } else if (c.outputDir.length === 0) {
      errors.push({ field: 'outputDir', message: 'Output directory cannot be empty' })
    }
  }

  if (c.timeoutMs !== undefined) {
    if (typeof c.timeoutMs !== 'number' || !Number.isInteger(c.timeoutMs) || c.timeoutMs <= 0) {
      errors.push({ field: 'timeoutMs', message: 'Timeout must be a positive integer (milliseconds)' })
    }
  }

  if (c.maxFileSize !== undefined) {
    if (typeof c.maxFileSize !== 'number' || !Number.isSafeInteger(c.maxFileSize) || c.maxFileSize < 0) {
      errors.push({ field: 'maxFileSize', message: 'Max file size must be a non-negative integer (bytes)' })
    }
  }

  if (c.overwrite !== undefined && typeof c.overwrite !== 'boolean') {
    errors.push({ field: 'overwrite', message: 'Overwrite must be a boolean' })
  }

  return errors
}

/** Keep only the fields that pass validation. */
function pickValid(parsed: Record<string, unknown>, invalid: Set<string>): Config {
  const config: Config = {}
  if (!invalid.has('port') && typeof parsed.port === 'number') config.port = parsed.port
  if (!invalid.has('outputDir') && typeof parsed.outputDir === 'string') config.outputDir = parsed.outputDir
  if (!invalid.has('timeoutMs') && typeof parsed.timeoutMs === 'number') config.timeoutMs = parsed.timeoutMs
  if (!invalid.has('maxFileSize') && typeof parsed.maxFileSize === 'number') config.maxFileSize = parsed.maxFileSize
  if (!invalid.has('overwrite') && typeof parsed.overwrite === 'boolean') config.overwrite = parsed.overwrite
  return config
}

export function loadConfig(file: string = CONFIG_FILE): Config {
  try {
    if (!fs.existsSync(file)) return {}

    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
    const errors = validateConfig(parsed)

    if (!isRecord(parsed)) {
      console.error(`Config file ${file} does not contain an object, ignoring it`)
      return {}
    }

    if (errors.length > 0) {
      console.error(`Config validation errors in ${file}:`)
      for (const err of errors) {
        console.error(`  - ${err.field}: ${err.message}`)
      }
      console.error('Using default values for invalid fields.')
    }

    return pickValid(parsed, new Set(errors.map(e => e.field)))
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${file}:`, err.message)
    } else {
      console.error('Failed to load config:', err)
    }
  }
  return {}
}

export function saveConfig(config: Config, file: string = CONFIG_FILE): boolean {
  const errors = validateConfig(config)
  if (errors.length > 0) {
    console.error('Cannot save invalid config:')
    for (const err of errors) {
      console.error(`  - ${err.field}: ${err.message}`)
    }
    return false
  }

  try {
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, JSON.stringify(config, null, 2))
    return true
  } catch (err) {
    console.error('Failed to save config:', err)
    return false
  }
}

export function resolveSettings(config: Config): Settings {
  return {
    port: config.port ?? DEFAULT_PORT,
    outputDir: config.outputDir ?? '.',
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxFileSize: config.maxFileSize ?? null,
    overwrite: config.overwrite ?? false
  }
}
