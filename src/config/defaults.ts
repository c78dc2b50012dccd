/**
 * Default Settings and Commands
 *
 * Seeded into the config directory on first run, and merged back into
 * the prompt file whenever one of the built-in commands goes missing.
 */

import { ConfigSchema, PromptConfigSchema, PromptEntry } from './schemas.js'

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1'

export const DEFAULT_MODEL = 'gpt-4o-mini'

const defaultConfig: ConfigSchema = {
  base_url: DEFAULT_BASE_URL,
  api_key: '',
  default_model: DEFAULT_MODEL
}

const defaultPrompts: Record<string, PromptEntry> = {
  translate: {
    template:
      'You are a professional translator, please translate the following text into natural, idiomatic {target_lang}:\n\n{input}. Avoid output anything else except the final result.',
    description: 'Translate text (default target: zh)',
    args: [
      {
        name: 'target_lang',
        default_value: 'zh',
        description: 'Target language for translation'
      }
    ]
  },
  polish: {
    template:
      'You are an expert editor. Please polish the following text to make it more clear, concise, and natural in a {tone} tone:\n\n{input}. Avoid output anything else except the final result.',
    description: 'Polish text for clarity',
    args: [
      {
        name: 'tone',
        default_value: 'professional',
        description: 'Tone for polishing (e.g., casual, professional, friendly)'
      }
    ]
  },
  rewrite: {
    template:
      'You are a skilled writer. Please rewrite the following text in a {style} style while preserving the meaning:\n\n{input}. Avoid output anything else except the final result.',
    description: 'Rewrite text in different style',
    args: [
      {
        name: 'style',
        default_value: 'formal',
        description: 'Writing style for rewrite (e.g., casual, formal, creative)'
      }
    ]
  },
  summarize: {
    template:
      'You are an expert summarizer. Please provide a concise summary of the following text with a {length} length:\n\n{input}. Avoid output anything else except the final result.',
    description: 'Summarize text',
    args: [
      {
        name: 'length',
        default_value: 'medium',
        description: 'Summary length (e.g., short, medium, long)'
      }
    ]
  },
  ask: {
    template: 'You are a helpful assistant called xa, execute anything by your side. {input}',
    description: 'Interactive conversation mode'
  }
}

/**
 * Get a fresh copy of the default API settings.
 */
export function getDefaultConfig(): ConfigSchema {
  return { ...defaultConfig }
}

/**
 * Get a fresh copy of the default prompt document.
 *
 * Copies are deep so callers may mutate the result freely.
 */
export function getDefaultPrompts(): PromptConfigSchema {
  const prompts: Record<string, PromptEntry> = {}
  for (const [name, entry] of Object.entries(defaultPrompts)) {
    prompts[name] = {
      ...entry,
      args: entry.args?.map(arg => ({ ...arg }))
    }
    if (prompts[name].args === undefined) delete prompts[name].args
  }
  return { prompts }
}
