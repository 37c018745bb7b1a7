/**
 * Settings Loader
 *
 * Reads an optional YAML settings file, overlays environment variables and
 * validates the result against {@link SettingsSchema}.
 */
import { existsSync, readFileSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import type { z } from 'zod'
import { SettingsSchema, type Settings } from './schema.js'
import { ConfigurationError } from '../errors.js'
import { isRecord } from '../types/json.js'

export interface LoadSettingsOptions {
  /**
   * Path to a YAML settings file. A missing file is an error only when the
   * path was given explicitly.
   */
  file?: string

  /**
   * Environment to read overrides from. Defaults to `process.env`.
   */
  env?: Record<string, string | undefined>
}

type RawSettings = Record<string, unknown>

/**
 * Environment variables and the settings path each one overrides.
 * Numeric settings are converted before validation.
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; path: readonly string[]; numeric?: boolean }> = [
  { variable: 'AGENT_APPROVAL_MODE', path: ['agent', 'approvalMode'] },
  { variable: 'AGENT_MAX_TOOL_CALLS', path: ['agent', 'maxToolCallsPerRun'], numeric: true },
  {
    variable: 'AGENT_MAX_CONSECUTIVE_TOOL_FAILURES',
    path: ['agent', 'maxConsecutiveToolFailures'],
    numeric: true,
  },
  { variable: 'MODEL_PROVIDER', path: ['model', 'provider'] },
  { variable: 'MODEL_ID', path: ['model', 'modelId'] },
  { variable: 'OPENROUTER_API_KEY', path: ['model', 'apiKey'] },
  { variable: 'AWS_REGION', path: ['model', 'region'] },
  { variable: 'AGENT_WORKING_DIRECTORY', path: ['tools', 'workingDirectory'] },
  { variable: 'GOOGLE_SEARCH_API_KEY', path: ['tools', 'search', 'apiKey'] },
  { variable: 'GOOGLE_SEARCH_ENGINE_ID', path: ['tools', 'search', 'engineId'] },
  { variable: 'AGENT_CUSTOM_PROMPT', path: ['customPrompt'] },
  { variable: 'LOG_LEVEL', path: ['logLevel'] },
]

/**
 * Loads and validates settings.
 *
 * @param options - File path and environment to read from
 * @returns Validated settings with defaults applied
 * @throws ConfigurationError when the file cannot be read or the settings are invalid
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env
  const raw = options.file !== undefined ? readSettingsFile(options.file) : {}

  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable]
    if (value === undefined || value === '') continue
    setPath(raw, override.path, override.numeric ? Number(value) : value)
  }

  const result = SettingsSchema.safeParse(raw)
  if (!result.success) {
    const source = options.file ?? 'environment'
    throw new ConfigurationError(`Invalid configuration in ${source}:\n${formatIssues(result.error)}`)
  }
  return result.data
}

function readSettingsFile(file: string): RawSettings {
  if (!existsSync(file)) {
    throw new ConfigurationError(`Configuration file not found: ${file}`)
  }

  let parsed: unknown
  try {
    parsed = parseYaml(readFileSync(file, 'utf-8'))
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${file}`, { cause: error })
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Invalid configuration in ${file}: expected a mapping at the top level`)
  }
  return parsed
}

function setPath(target: RawSettings, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path
  if (head === undefined) return
  if (rest.length === 0) {
    target[head] = value
    return
  }
  const existing = target[head]
  const child: RawSettings = isRecord(existing) ? existing : {}
  target[head] = child
  setPath(child, rest, value)
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.map(String).join('.')}: ${issue.message}`).join('\n')
}
