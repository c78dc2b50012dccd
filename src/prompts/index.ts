/**
 * Prompt Store
 *
 * Named prompt templates kept in prompts.json. The built-in commands
 * are reconciled into the stored mapping on every load, so deleting
 * one only lasts until the next invocation.
 */

import { join } from 'path'
import { getConfigDir, PROMPTS_FILE } from '../config/index.js'
import { getDefaultPrompts } from '../config/defaults.js'
import { readDocument, writeDocument } from '../config/document.js'
import { validatePromptConfig, PromptConfigSchema, PromptEntry } from '../config/schemas.js'

export function getPromptsPath(dir: string = getConfigDir()): string {
  return join(dir, PROMPTS_FILE)
}

/**
 * Overlay default commands that are absent from the stored mapping.
 *
 * @returns the merged document and whether anything was added
 */
export function reconcilePrompts(stored: PromptConfigSchema): { config: PromptConfigSchema; changed: boolean } {
  const prompts: Record<string, PromptEntry> = { ...stored.prompts }
  let changed = false

  for (const [name, entry] of Object.entries(getDefaultPrompts().prompts)) {
    if (!(name in prompts)) {
      prompts[name] = entry
      changed = true
    }
  }

  return { config: { prompts }, changed }
}

/**
 * Load the prompt templates, seeding and reconciling defaults.
 *
 * The file is written back when it did not exist yet or when a
 * default command had to be restored.
 */
export async function loadPrompts(dir: string = getConfigDir()): Promise<PromptConfigSchema> {
  const path = getPromptsPath(dir)
  const doc = await readDocument(path, {
    label: PROMPTS_FILE,
    validate: validatePromptConfig,
    defaults: getDefaultPrompts
  })

  const { config, changed } = reconcilePrompts(doc.value)
  if (changed || doc.status === 'missing') {
    await writeDocument(path, config)
  }

  return config
}

export async function savePrompts(config: PromptConfigSchema, dir: string = getConfigDir()): Promise<void> {
  await writeDocument(getPromptsPath(dir), config)
}

/**
 * Add or overwrite a command.
 *
 * @returns true if an existing command was replaced
 */
export async function addPrompt(name: string, entry: PromptEntry, dir: string = getConfigDir()): Promise<boolean> {
  const config = await loadPrompts(dir)
  const replaced = name in config.prompts
  config.prompts[name] = entry
  await savePrompts(config, dir)
  return replaced
}

/**
 * Remove a command.
 *
 * @returns false if no command with that name exists
 */
export async function removePrompt(name: string, dir: string = getConfigDir()): Promise<boolean> {
  const config = await loadPrompts(dir)
  if (!(name in config.prompts)) {
    return false
  }

  delete config.prompts[name]
  await savePrompts(config, dir)
  return true
}

/**
 * Replace every stored command with the defaults.
 */
export async function resetPrompts(dir: string = getConfigDir()): Promise<PromptConfigSchema> {
  const defaults = getDefaultPrompts()
  await savePrompts(defaults, dir)
  return defaults
}

/**
 * Commands sorted by name, for display.
 */
export function listPrompts(config: PromptConfigSchema): Array<[string, PromptEntry]> {
  return Object.entries(config.prompts).sort(([a], [b]) => a.localeCompare(b))
}

export { findCommand, resolveCommand, fuzzyScore } from './resolver.js'
export type { Resolution } from './resolver.js'
export { fillTemplate, preprocessCommand } from './template.js'
