/**
 * Security Tests: Context Leak Prevention
 *
 * These tests verify that stored secret values never reach:
 * - The language model (tagging and search requests)
 * - The audit log
 * - The masked listing
 * - Confirmation output of `xa add`
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { AuditLogger, SecretStore } from '../../src/store/index'
import { makeTempDir, readJsonLines, removeDir } from '../helpers/tmp'
import { StubLLM } from '../helpers/llm'

const SECRET = 'test-secret-value-0001'

describe('Security: Context Leak Prevention', () => {
  let dir: string

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  async function populatedStore(llm: StubLLM): Promise<{ store: SecretStore; audit: AuditLogger }> {
    const audit = new AuditLogger(dir)
    const store = new SecretStore(llm, { dir, now: () => 1_000, onAudit: audit.handler() })
    await store.add(SECRET, 'staging database password')
    return { store, audit }
  }

  describe('Model requests', () => {
    it('should never include the secret in tagging or search prompts', async () => {
      const llm = new StubLLM('{"tag": "staging-db"}', '{"tag": "other"}', '{"found": true, "id": 1000}')
      const { store } = await populatedStore(llm)
      await store.add('test-secret-value-0002', 'other thing')

      const result = await store.search('staging db')

      expect(result.found).toBe(true)
      expect(llm.prompts).toHaveLength(3)
      for (const prompt of llm.prompts) {
        expect(prompt).not.toContain(SECRET)
        expect(prompt).not.toContain('test-secret-value-0002')
      }
    })

    it('should not leak the secret when the query repeats it', async () => {
      const llm = new StubLLM('{"tag": "staging-db"}', '{"found": false, "id": null}')
      const { store } = await populatedStore(llm)

      await store.search('where is staging')

      expect(llm.conversations[1]).toHaveLength(1)
      expect(llm.conversations[1][0].content).not.toContain(SECRET)
    })
  })

  describe('Audit log', () => {
    it('should record metadata only', async () => {
      const llm = new StubLLM('{"tag": "staging-db"}', '{"found": true, "id": 1000}')
      const { store, audit } = await populatedStore(llm)
      await store.search('staging database')

      const content = readFileSync(audit.path, 'utf-8')

      expect(content).not.toContain(SECRET)
      expect(content).not.toContain('staging database')
      expect(await readJsonLines(audit.path)).toEqual([
        { timestamp: '1970-01-01T00:00:01.000Z', operation: 'add', success: true, entryId: 1000, tag: 'staging-db' },
        { timestamp: '1970-01-01T00:00:01.000Z', operation: 'search', success: true, entryId: 1000, tag: 'staging-db' }
      ])
    })
  })

  describe('Listing', () => {
    it('should replace secrets with placeholders', async () => {
      const { store } = await populatedStore(new StubLLM('{"tag": "staging-db"}'))

      const listed = await store.list()

      expect(JSON.stringify(listed)).not.toContain(SECRET)
      expect(listed[0].secret_placeholder).toBe('SECRET_1000')
    })
  })

  describe('CLI sources', () => {
    it('should not echo the secret after adding it', () => {
      const source = readFileSync(join(__dirname, '../../src/cli/commands/add.ts'), 'utf-8')

      expect(source).not.toMatch(/\$\{secret\}/)
      expect(source).not.toMatch(/entry\.secret/)
    })
  })
})
