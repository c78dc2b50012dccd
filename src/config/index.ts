/**
 * Configuration Loader and Saver
 *
 * Handles the API settings document and the location of every file xa
 * keeps. Files live in ~/.config/xa unless XA_CONFIG_DIR points elsewhere.
 */

import { join } from 'path'
import { homedir } from 'os'
import { isCompleteConfig, validateConfig, ConfigSchema } from './schemas.js'
import { getDefaultConfig } from './defaults.js'
import { readDocument, writeDocument } from './document.js'
import { ConfigValidationError, MissingApiKeyError } from './errors.js'

export const CONFIG_FILE = 'config.json'
export const PROMPTS_FILE = 'prompts.json'
export const STORE_FILE = 'stores.json'
export const AUDIT_FILE = 'audit.log'

const CONFIG_KEYS = ['base_url', 'api_key', 'default_model'] as const

/**
 * Resolve the xa configuration directory.
 *
 * @returns $XA_CONFIG_DIR when set, otherwise ~/.config/xa
 */
export function getConfigDir(): string {
  const override = process.env.XA_CONFIG_DIR
  if (override && override.trim() !== '') {
    return override
  }
  return join(homedir(), '.config', 'xa')
}

/**
 * Get the settings file path.
 *
 * Useful for displaying to the user in CLI output.
 */
export function getConfigPath(dir: string = getConfigDir()): string {
  return join(dir, CONFIG_FILE)
}

/**
 * Load the API settings.
 *
 * Keys absent from the stored document are filled from the defaults
 * and the merged document is written back. A missing file yields the
 * defaults without creating one; that happens in the setup flow.
 */
export async function loadConfig(dir: string = getConfigDir()): Promise<ConfigSchema> {
  const path = getConfigPath(dir)
  const doc = await readDocument<Partial<ConfigSchema>>(path, {
    label: CONFIG_FILE,
    validate: validateConfig,
    defaults: getDefaultConfig
  })

  const merged: ConfigSchema = { ...getDefaultConfig(), ...doc.value }

  const missingKeys = CONFIG_KEYS.some(key => doc.value[key] === undefined)
  if (doc.status === 'loaded' && missingKeys) {
    await writeDocument(path, merged)
  }

  return merged
}

/**
 * Save the API settings.
 *
 * @throws ConfigValidationError if the settings are incomplete
 * @throws ConfigWriteError if the file cannot be written
 */
export async function saveConfig(config: ConfigSchema, dir: string = getConfigDir()): Promise<void> {
  if (!isCompleteConfig(config)) {
    throw new ConfigValidationError('base_url and api_key must be strings.')
  }

  await writeDocument(getConfigPath(dir), config)
}

/**
 * Ensure an API key is configured before any request is made.
 *
 * @throws MissingApiKeyError if the key is empty
 */
export function requireApiKey(config: ConfigSchema): void {
  if (config.api_key.trim() === '') {
    throw new MissingApiKeyError()
  }
}

export {
  ConfigValidationError,
  ConfigReadError,
  ConfigWriteError,
  MissingApiKeyError,
  errorMessage
} from './errors.js'

export type {
  ConfigSchema,
  PromptArg,
  PromptEntry,
  PromptConfigSchema,
  StoreEntry,
  StoreSchema,
  ValidationError,
  ValidationResult
} from './schemas.js'
