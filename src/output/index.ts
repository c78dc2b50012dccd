/**
 * Result rendering and clipboard copy.
 */

import { execFile } from 'child_process'
import chalk from 'chalk'
import { errorMessage } from '../config/errors.js'

const EXEC_TIMEOUT_MS = 5_000

interface ClipboardTool {
  file: string
  args: string[]
}

function clipboardTools(platform: NodeJS.Platform): ClipboardTool[] {
  switch (platform) {
    case 'darwin':
      return [{ file: 'pbcopy', args: [] }]
    case 'win32':
      return [{ file: 'clip', args: [] }]
    default:
      return [
        { file: 'xclip', args: ['-selection', 'clipboard'] },
        { file: 'xsel', args: ['-bi'] }
      ]
  }
}

export interface ClipboardOptions {
  platform?: NodeJS.Platform
  /** Environment for the clipboard tool (the current one by default) */
  env?: NodeJS.ProcessEnv
}

function pipeTo(tool: ClipboardTool, text: string, env: NodeJS.ProcessEnv): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const child = execFile(tool.file, tool.args, { timeout: EXEC_TIMEOUT_MS, env }, (error) => {
      if (error) {
        reject(error)
        return
      }
      resolve()
    })

    if (child.stdin) {
      child.stdin.on('error', reject)
      child.stdin.write(text)
      child.stdin.end()
    }
  })
}

/**
 * Copy text to the system clipboard using the platform's tool
 * (pbcopy, clip, or xclip with xsel as fallback).
 *
 * @throws Error naming the tools tried when none worked
 */
export async function copyToClipboard(text: string, options: ClipboardOptions = {}): Promise<void> {
  const tools = clipboardTools(options.platform ?? process.platform)

  for (const tool of tools) {
    try {
      await pipeTo(tool, text, options.env ?? process.env)
      return
    } catch {
      continue
    }
  }

  const names = tools.map(tool => tool.file).join(' or ')
  throw new Error(`Could not copy to clipboard. Install ${names} to enable clipboard support.`)
}

/**
 * Copy a result, downgrading any failure to a warning.
 *
 * @returns whether the copy succeeded
 */
export async function tryCopyToClipboard(text: string, options: ClipboardOptions = {}): Promise<boolean> {
  try {
    await copyToClipboard(text, options)
    return true
  } catch (error: unknown) {
    console.warn(chalk.yellow(`Warning: ${errorMessage(error)}`))
    return false
  }
}

export function formatElapsed(ms: number): string {
  return `(Completed in ${(ms / 1000).toFixed(2)}s)`
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word !== '').length
}

function clock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(part => String(part).padStart(2, '0'))
    .join(':')
}

/**
 * Footer shown after a one-shot command.
 */
export function formatFooter(text: string, copied: boolean, now: Date = new Date()): string {
  const parts = [
    copied ? '✓ copied to clipboard' : '✓ done',
    `tokens: ${countWords(text)}`,
    clock(now)
  ]
  return parts.join(' · ')
}

export interface RenderOptions {
  /** The text was already written while streaming */
  streamed: boolean
  /** Show the footer (one-shot commands) */
  footer: boolean
  copied: boolean
  elapsedMs?: number
}

export function renderResult(text: string, options: RenderOptions): void {
  if (!options.streamed) {
    console.log(text)
  }

  if (options.elapsedMs !== undefined && text.trim() !== '') {
    console.log(chalk.gray(`\n${formatElapsed(options.elapsedMs)}`))
  }

  if (options.footer) {
    console.log(chalk.gray(formatFooter(text, options.copied)))
  }
}
