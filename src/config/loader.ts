import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { RemoteLoginConfigSchema, type RemoteLoginConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Environment variables with this prefix override config values. */
export const ENV_PREFIX = 'QR_LOGIN_'

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

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values;
 * arrays replace rather than concatenate.
 */
function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  const result: JsonObject = { ...target }
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key]
    result[key] = isObject(sourceVal) && isObject(targetVal) ? deepMerge(targetVal, sourceVal) : sourceVal
  }
  return result
}

/**
 * Environment variables are always strings; convert numeric and boolean
 * strings so they validate against the schema.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)
  return value
}

/** Match a key against existing keys case-insensitively (env names are upper-case). */
function resolveKey(obj: JsonObject, key: string): string {
  const lower = key.toLowerCase()
  return Object.keys(obj).find((k) => k.toLowerCase() === lower) ?? key
}

function setNestedValue(obj: JsonObject, path: string[], value: unknown): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const key = resolveKey(current, segment)
    const child = current[key]
    if (isObject(child)) {
      current = child
    } else {
      const created: JsonObject = {}
      current[key] = created
      current = created
    }
  }
  current[resolveKey(current, path[path.length - 1])] = value
}

/**
 * Apply QR_LOGIN_ prefixed environment variable overrides.
 * Double underscores (__) separate nested keys:
 *   QR_LOGIN_RECONNECT__MAXATTEMPTS=5 -> config.reconnect.maxAttempts = 5
 */
function applyEnvOverrides(config: JsonObject, env: NodeJS.ProcessEnv): JsonObject {
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

function readConfigFile(configPath: string): JsonObject {
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
  if (!isObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen RemoteLoginConfig.
 *
 * Pipeline: read file (if given) -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> check QR template -> freeze
 *
 * @param configPath - Path to qr-login.config.json; omit to use defaults and env only
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): RemoteLoginConfig {
  const userConfig = configPath ? readConfigFile(configPath) : {}

  // structuredClone so the frozen result never aliases DEFAULT_CONFIG
  const merged = applyEnvOverrides(deepMerge(structuredClone(DEFAULT_CONFIG), userConfig), env)

  if (!Value.Check(RemoteLoginConfigSchema, merged)) {
    const fields = [...Value.Errors(RemoteLoginConfigSchema, merged)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  if (!merged.qr.urlTemplate.includes('{fingerprint}')) {
    throw new ConfigError(
      `Invalid QR URL template "${merged.qr.urlTemplate}": missing {fingerprint} placeholder`,
      [{ path: '/qr/urlTemplate', message: 'missing {fingerprint} placeholder' }],
    )
  }

  return deepFreeze(merged)
}
