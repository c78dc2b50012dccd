/**
 * Config Loader/Saver Tests
 *
 * Each test works in its own temporary config directory.
 */

import { promises as fs, readFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import {
  getConfigDir,
  getConfigPath,
  loadConfig,
  saveConfig,
  requireApiKey,
  ConfigSchema,
  ConfigValidationError,
  ConfigReadError,
  ConfigWriteError,
  MissingApiKeyError
} from '../../../src/config/index'
import { makeTempDir, readJson, removeDir } from '../../helpers/tmp'

let dir: string

beforeEach(async () => {
  dir = await makeTempDir()
})

afterEach(async () => {
  await removeDir(dir)
})

describe('getConfigDir', () => {
  const original = process.env.XA_CONFIG_DIR

  afterEach(() => {
    if (original === undefined) {
      delete process.env.XA_CONFIG_DIR
    } else {
      process.env.XA_CONFIG_DIR = original
    }
  })

  it('should default to ~/.config/xa', () => {
    delete process.env.XA_CONFIG_DIR
    expect(getConfigDir()).toBe(join(homedir(), '.config', 'xa'))
  })

  it('should honour XA_CONFIG_DIR', () => {
    process.env.XA_CONFIG_DIR = '/tmp/xa-elsewhere'
    expect(getConfigDir()).toBe('/tmp/xa-elsewhere')
  })

  it('should ignore a blank XA_CONFIG_DIR', () => {
    process.env.XA_CONFIG_DIR = '  '
    expect(getConfigDir()).toBe(join(homedir(), '.config', 'xa'))
  })
})

describe('getConfigPath', () => {
  it('should return config.json inside the directory', () => {
    expect(getConfigPath('/some/dir')).toBe(join('/some/dir', 'config.json'))
  })
})

describe('loadConfig', () => {
  it('should return defaults without creating a file when none exists', async () => {
    const config = await loadConfig(dir)

    expect(config).toEqual({
      base_url: 'https://api.openai.com/v1',
      api_key: '',
      default_model: 'gpt-4o-mini'
    })
    await expect(fs.access(getConfigPath(dir))).rejects.toThrow()
  })

  it('should fill absent keys from defaults and write them back', async () => {
    await fs.writeFile(getConfigPath(dir), JSON.stringify({ api_key: 'test-key' }))

    const config = await loadConfig(dir)

    expect(config).toEqual({
      base_url: 'https://api.openai.com/v1',
      api_key: 'test-key',
      default_model: 'gpt-4o-mini'
    })
    expect(await readJson(getConfigPath(dir))).toEqual(config)
  })

  it('should back up a corrupted file and reseed defaults', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    await fs.writeFile(getConfigPath(dir), 'base_url = "toml, not json"')

    const config = await loadConfig(dir)

    expect(config.api_key).toBe('')
    expect(readFileSync(`${getConfigPath(dir)}.backup`, 'utf-8')).toBe('base_url = "toml, not json"')
    expect(await readJson(getConfigPath(dir))).toEqual(config)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(String(warn.mock.calls[0][0])).toContain(`${getConfigPath(dir)}.backup`)

    warn.mockRestore()
  })

  it('should wrap unreadable paths in ConfigReadError', async () => {
    await fs.mkdir(getConfigPath(dir))

    await expect(loadConfig(dir)).rejects.toThrow(ConfigReadError)
  })
})

describe('saveConfig', () => {
  it('should round-trip a settings document', async () => {
    const config: ConfigSchema = {
      base_url: 'http://localhost:11434/v1',
      api_key: 'test-key',
      default_model: 'llama3'
    }

    await saveConfig(config, dir)

    expect(await loadConfig(dir)).toEqual(config)
  })

  it('should create the directory when it is missing', async () => {
    const nested = join(dir, 'nested', 'xa')

    await saveConfig({ base_url: 'http://localhost/v1', api_key: 'k' }, nested)

    expect(await readJson(getConfigPath(nested))).toEqual({ base_url: 'http://localhost/v1', api_key: 'k' })
  })

  it('should write the file owner-readable only', async () => {
    await saveConfig({ base_url: 'http://localhost/v1', api_key: 'k' }, dir)

    const stat = await fs.stat(getConfigPath(dir))
    expect(stat.mode & 0o777).toBe(0o600)
  })

  it('should reject incomplete settings', async () => {
    const incomplete = JSON.parse('{"base_url": "http://localhost/v1"}')

    await expect(saveConfig(incomplete, dir)).rejects.toThrow(ConfigValidationError)
  })
})

describe('requireApiKey', () => {
  it('should throw when the key is empty or blank', () => {
    expect(() => requireApiKey({ base_url: 'x', api_key: '' })).toThrow(MissingApiKeyError)
    expect(() => requireApiKey({ base_url: 'x', api_key: '   ' })).toThrow(
      "API key not configured. Please run 'xa --set openai' first."
    )
  })

  it('should pass when a key is set', () => {
    expect(() => requireApiKey({ base_url: 'x', api_key: 'test-key' })).not.toThrow()
  })
})

describe('Error Classes', () => {
  it('ConfigValidationError should have correct properties', () => {
    const error = new ConfigValidationError('Test error')
    expect(error.name).toBe('ConfigValidationError')
    expect(error.message).toBe('Configuration validation failed: Test error')
  })

  it('ConfigReadError should keep its cause', () => {
    const cause = new Error('File not found')
    const error = new ConfigReadError('Cannot read', cause)
    expect(error.name).toBe('ConfigReadError')
    expect(error.message).toBe('Failed to read configuration: Cannot read')
    expect(error.cause).toBe(cause)
  })

  it('ConfigWriteError should keep its cause', () => {
    const cause = new Error('Permission denied')
    const error = new ConfigWriteError('Cannot write', cause)
    expect(error.name).toBe('ConfigWriteError')
    expect(error.cause).toBe(cause)
  })
})
