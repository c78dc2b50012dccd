/**
 * JSON Document Persistence
 *
 * Every file xa keeps (settings, prompts, secret store) goes through
 * these two functions. A document that cannot be parsed or fails its
 * validator is moved aside to `<file>.backup` and replaced with fresh
 * defaults; that situation is reported as a warning, never as an error.
 */

import { dirname, basename, join } from 'path'
import { promises as fs } from 'fs'
import chalk from 'chalk'
import { ConfigReadError, ConfigWriteError, errorMessage, isNotFoundError } from './errors.js'

export type DocumentStatus = 'loaded' | 'missing' | 'recovered'

export interface LoadedDocument<T> {
  value: T
  status: DocumentStatus
  backupPath?: string
}

export interface DocumentOptions<T> {
  /** File name shown in the corruption warning (e.g. "prompts.json") */
  label: string
  validate: (value: unknown) => value is T
  defaults: () => T
}

/**
 * Read and validate a JSON document.
 *
 * A missing file yields the defaults without touching the disk.
 * A corrupted file is backed up, the defaults are written in its place
 * and a warning naming the backup path goes to stderr.
 *
 * @throws ConfigReadError if the file exists but cannot be read
 */
export async function readDocument<T>(path: string, options: DocumentOptions<T>): Promise<LoadedDocument<T>> {
  let raw: string
  try {
    raw = await fs.readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (isNotFoundError(error)) {
      return { value: options.defaults(), status: 'missing' }
    }
    throw new ConfigReadError(errorMessage(error), error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return recover(path, options)
  }

  if (!options.validate(parsed)) {
    return recover(path, options)
  }

  return { value: parsed, status: 'loaded' }
}

async function recover<T>(path: string, options: DocumentOptions<T>): Promise<LoadedDocument<T>> {
  const backupPath = `${path}.backup`

  try {
    await fs.rename(path, backupPath)
  } catch (error: unknown) {
    throw new ConfigReadError(`could not back up corrupted ${options.label}: ${errorMessage(error)}`, error)
  }

  const value = options.defaults()
  await writeDocument(path, value)

  console.warn(chalk.yellow(
    `Warning: Corrupted ${options.label} detected. Backed up to ${backupPath} and created a new one.`
  ))

  return { value, status: 'recovered', backupPath }
}

/**
 * Write a JSON document.
 *
 * Creates the parent directory when needed and writes through a
 * temporary file so readers never see partially-written JSON.
 *
 * @throws ConfigWriteError if the file cannot be written
 */
export async function writeDocument(path: string, value: unknown): Promise<void> {
  const dir = dirname(path)
  const tmpPath = join(dir, `${basename(path)}.tmp.${process.pid}.${Date.now()}`)

  try {
    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(tmpPath, JSON.stringify(value, null, 2) + '\n', {
      encoding: 'utf-8',
      mode: 0o600
    })
    await fs.rename(tmpPath, path)
  } catch (error: unknown) {
    throw new ConfigWriteError(errorMessage(error), error)
  }
}
