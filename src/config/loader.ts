import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { SmbputConfigSchema, type SmbputConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Environment variable prefix for config overrides */
export const ENV_PREFIX = 'SMBPUT_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values win; arrays are replaced.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target }
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key]
    result[key] =
      isPlainObject(sourceVal) && isPlainObject(targetVal)
        ? deepMerge(targetVal, sourceVal)
        : sourceVal
  }
  return result
}

/**
 * Environment variables are always strings; turn numeric and boolean strings
 * into numbers and booleans.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)
  return value
}

/** Existing key matching `key` case-insensitively, else `key` itself. */
function findKey(obj: PlainObject, key: string): string {
  const lowerKey = key.toLowerCase()
  return Object.keys(obj).find((k) => k.toLowerCase() === lowerKey) ?? key
}

function setNestedValue(obj: PlainObject, path: string[], value: unknown): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const key = findKey(current, segment)
    const next = current[key]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: PlainObject = {}
      current[key] = created
      current = created
    }
  }
  current[findKey(current, path[path.length - 1])] = value
}

/**
 * Apply SMBPUT_ prefixed environment variable overrides. Double underscores
 * separate nested keys:
 *   SMBPUT_CONNECTION__TIMEOUTMS=5000 -> config.connection.timeoutMs = 5000
 */
function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

function readConfigFile(configPath: string): PlainObject {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen SmbputConfig.
 *
 * Pipeline: read file (if given) -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to smbput.config.json; defaults only when omitted
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SmbputConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // structuredClone keeps DEFAULT_CONFIG untouched by env overrides
  const config: unknown = applyEnvOverrides(deepMerge(structuredClone(DEFAULT_CONFIG), userConfig), env)

  if (!Value.Check(SmbputConfigSchema, config)) {
    const fields = [...Value.Errors(SmbputConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(config)
}
