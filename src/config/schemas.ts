/**
 * Document Schemas
 *
 * Shapes of the three JSON documents kept in the xa config directory
 * (API settings, prompt templates, secret store) and the validators
 * that decide whether a file on disk is usable or must be reset.
 */

/**
 * API settings. Keys mirror the on-disk document.
 */
export interface ConfigSchema {
  base_url: string
  api_key: string
  default_model?: string
}

/**
 * A named argument declared by a prompt template.
 * Its placeholder is `{name}`; positional CLI arguments fill
 * declared arguments in order.
 */
export interface PromptArg {
  name: string
  default_value: string
  description?: string
}

export interface PromptEntry {
  template: string
  description?: string
  args?: PromptArg[]
}

export interface PromptConfigSchema {
  prompts: Record<string, PromptEntry>
}

/**
 * A stored secret. The id is the creation time in milliseconds.
 */
export interface StoreEntry {
  id: number
  tag: string
  note: string
  secret: string
  created_at: string
}

export interface StoreSchema {
  entries: StoreEntry[]
}

/**
 * Validation error details.
 */
export interface ValidationError {
  path: string
  message: string
  value?: unknown
}

/**
 * Result of document validation.
 */
export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string'
}

/**
 * Validates the API settings document.
 *
 * Keys that are absent are allowed here; they are filled from
 * defaults when the document is loaded.
 */
export function validateConfigDetailed(config: unknown): ValidationResult {
  const errors: ValidationError[] = []

  if (!isRecord(config)) {
    errors.push({ path: 'root', message: 'Configuration must be an object' })
    return { valid: false, errors }
  }

  for (const key of ['base_url', 'api_key', 'default_model'] as const) {
    if (!optionalString(config[key])) {
      errors.push({ path: key, message: `${key} must be a string`, value: config[key] })
    }
  }

  return { valid: errors.length === 0, errors }
}

/**
 * Type guard for a partially-filled settings document.
 */
export function validateConfig(config: unknown): config is Partial<ConfigSchema> {
  return validateConfigDetailed(config).valid
}

/**
 * Type guard for a complete settings document, used before saving.
 */
export function isCompleteConfig(config: unknown): config is ConfigSchema {
  return validateConfig(config)
    && typeof config.base_url === 'string'
    && typeof config.api_key === 'string'
}

function validatePromptArg(path: string, arg: unknown): ValidationError[] {
  if (!isRecord(arg)) {
    return [{ path, message: 'Argument must be an object' }]
  }

  const errors: ValidationError[] = []

  if (typeof arg.name !== 'string' || arg.name.trim() === '') {
    errors.push({ path: `${path}.name`, message: 'name must be a non-empty string' })
  }
  if (typeof arg.default_value !== 'string') {
    errors.push({ path: `${path}.default_value`, message: 'default_value must be a string' })
  }
  if (!optionalString(arg.description)) {
    errors.push({ path: `${path}.description`, message: 'description must be a string' })
  }

  return errors
}

function validatePromptEntry(name: string, entry: unknown): ValidationError[] {
  const path = `prompts.${name}`

  if (!isRecord(entry)) {
    return [{ path, message: 'Prompt entry must be an object' }]
  }

  const errors: ValidationError[] = []

  if (typeof entry.template !== 'string') {
    errors.push({ path: `${path}.template`, message: 'template must be a string' })
  }
  if (!optionalString(entry.description)) {
    errors.push({ path: `${path}.description`, message: 'description must be a string' })
  }
  if (entry.args !== undefined) {
    if (!Array.isArray(entry.args)) {
      errors.push({ path: `${path}.args`, message: 'args must be an array' })
    } else {
      entry.args.forEach((arg, i) => errors.push(...validatePromptArg(`${path}.args[${i}]`, arg)))
    }
  }

  return errors
}

/**
 * Validates the prompt templates document.
 */
export function validatePromptConfigDetailed(doc: unknown): ValidationResult {
  if (!isRecord(doc) || !isRecord(doc.prompts)) {
    return { valid: false, errors: [{ path: 'prompts', message: 'prompts must be an object' }] }
  }

  const errors: ValidationError[] = []
  for (const [name, entry] of Object.entries(doc.prompts)) {
    errors.push(...validatePromptEntry(name, entry))
  }

  return { valid: errors.length === 0, errors }
}

export function validatePromptConfig(doc: unknown): doc is PromptConfigSchema {
  return validatePromptConfigDetailed(doc).valid
}

function validateStoreEntry(index: number, entry: unknown): ValidationError[] {
  const path = `entries[${index}]`

  if (!isRecord(entry)) {
    return [{ path, message: 'Entry must be an object' }]
  }

  const errors: ValidationError[] = []

  if (typeof entry.id !== 'number' || !Number.isSafeInteger(entry.id)) {
    errors.push({ path: `${path}.id`, message: 'id must be an integer', value: entry.id })
  }
  for (const key of ['tag', 'note', 'secret', 'created_at'] as const) {
    if (typeof entry[key] !== 'string') {
      errors.push({ path: `${path}.${key}`, message: `${key} must be a string` })
    }
  }

  return errors
}

/**
 * Validates the secret store document.
 */
export function validateStoreDetailed(doc: unknown): ValidationResult {
  if (!isRecord(doc) || !Array.isArray(doc.entries)) {
    return { valid: false, errors: [{ path: 'entries', message: 'entries must be an array' }] }
  }

  const errors: ValidationError[] = []
  doc.entries.forEach((entry, i) => errors.push(...validateStoreEntry(i, entry)))

  return { valid: errors.length === 0, errors }
}

export function validateStore(doc: unknown): doc is StoreSchema {
  return validateStoreDetailed(doc).valid
}
