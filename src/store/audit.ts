import { dirname, join } from 'path'
import { promises as fs } from 'fs'
import { AUDIT_FILE, errorMessage, getConfigDir } from '../config/index.js'

/**
 * Audit event emitted by the secret store - metadata only.
 * Never carries the secret, the note or the search query.
 */
export interface AuditEvent {
  timestamp: string
  operation: 'add' | 'search'
  success: boolean
  /** Entry the operation touched, if any */
  entryId?: number
  tag?: string
  errorMessage?: string
}

export type AuditHandler = (event: AuditEvent) => void | Promise<void>

const FORBIDDEN_KEYS = ['value', 'secret', 'note', 'query', 'password', 'token', 'key']

/**
 * Appends audit events as JSON lines to audit.log in the config directory.
 */
export class AuditLogger {
  private logPath: string

  constructor(dir: string = getConfigDir()) {
    this.logPath = join(dir, AUDIT_FILE)
  }

  get path(): string {
    return this.logPath
  }

  /**
   * Write an audit entry to the log.
   * Failures are reported as a warning and never propagate.
   */
  async log(event: AuditEvent): Promise<void> {
    try {
      await fs.mkdir(dirname(this.logPath), { recursive: true })
      await fs.appendFile(this.logPath, JSON.stringify(this.sanitize(event)) + '\n', { mode: 0o600 })
    } catch (error: unknown) {
      console.warn(`Warning: could not write audit log: ${errorMessage(error)}`)
    }
  }

  handler(): AuditHandler {
    return event => this.log(event)
  }

  private sanitize(event: AuditEvent): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...event }
    for (const key of FORBIDDEN_KEYS) {
      delete sanitized[key]
    }
    return sanitized
  }
}
