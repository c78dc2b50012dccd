/**
 * Document Schema Tests
 */

import {
  isCompleteConfig,
  validateConfig,
  validateConfigDetailed,
  validatePromptConfig,
  validatePromptConfigDetailed,
  validateStore,
  validateStoreDetailed
} from '../../../src/config/schemas'

describe('validateConfig', () => {
  it('should accept a complete settings document', () => {
    expect(validateConfig({
      base_url: 'https://api.openai.com/v1',
      api_key: 'test-key',
      default_model: 'gpt-4o-mini'
    })).toBe(true)
  })

  it('should accept a document with missing keys', () => {
    expect(validateConfig({ api_key: 'test-key' })).toBe(true)
    expect(validateConfig({})).toBe(true)
  })

  it('should reject non-objects', () => {
    expect(validateConfig(null)).toBe(false)
    expect(validateConfig('config')).toBe(false)
    expect(validateConfig([])).toBe(false)
  })

  it('should report the path of a mistyped key', () => {
    const result = validateConfigDetailed({ base_url: 42 })

    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([
      { path: 'base_url', message: 'base_url must be a string', value: 42 }
    ])
  })
})

describe('isCompleteConfig', () => {
  it('should require base_url and api_key', () => {
    expect(isCompleteConfig({ base_url: 'http://localhost:8080/v1', api_key: '' })).toBe(true)
    expect(isCompleteConfig({ base_url: 'http://localhost:8080/v1' })).toBe(false)
  })
})

describe('validatePromptConfig', () => {
  it('should accept entries with and without args', () => {
    expect(validatePromptConfig({
      prompts: {
        echo: { template: '{input}' },
        greet: {
          template: 'Say hi in {lang}: {input}',
          description: 'Greeting',
          args: [{ name: 'lang', default_value: 'en', description: 'Language' }]
        }
      }
    })).toBe(true)
  })

  it('should reject a missing prompts mapping', () => {
    expect(validatePromptConfig({})).toBe(false)
    expect(validatePromptConfig({ prompts: [] })).toBe(false)
  })

  it('should report invalid args with their index', () => {
    const result = validatePromptConfigDetailed({
      prompts: {
        bad: { template: 'x', args: [{ name: 'ok', default_value: 'v' }, { name: '', default_value: 3 }] }
      }
    })

    expect(result.valid).toBe(false)
    expect(result.errors.map(e => e.path)).toEqual([
      'prompts.bad.args[1].name',
      'prompts.bad.args[1].default_value'
    ])
  })

  it('should reject an entry without a template', () => {
    expect(validatePromptConfig({ prompts: { empty: { description: 'no template' } } })).toBe(false)
  })
})

describe('validateStore', () => {
  const entry = {
    id: 1700000000000,
    tag: 'api-key',
    note: 'api key',
    secret: 'test-secret',
    created_at: '2023-11-14T22:13:20.000Z'
  }

  it('should accept a list of well-formed entries', () => {
    expect(validateStore({ entries: [] })).toBe(true)
    expect(validateStore({ entries: [entry] })).toBe(true)
  })

  it('should reject entries with a non-integer id', () => {
    const result = validateStoreDetailed({ entries: [{ ...entry, id: '17' }] })

    expect(result.valid).toBe(false)
    expect(result.errors[0].path).toBe('entries[0].id')
  })

  it('should reject entries missing the secret', () => {
    const { secret: _secret, ...withoutSecret } = entry
    expect(validateStore({ entries: [withoutSecret] })).toBe(false)
  })
})
