import { getConfigDir, loadConfig, requireApiKey } from '../config/index.js'
import { LLMClient, OpenAICompatibleClient } from '../llm/client.js'
import { AuditLogger, SecretStore } from '../store/index.js'

/**
 * Load the settings and build a client.
 *
 * @param requireKey - refuse to go on without an API key
 * @throws MissingApiKeyError
 */
export async function loadClient(dir: string = getConfigDir(), requireKey = true): Promise<LLMClient> {
  const config = await loadConfig(dir)
  if (requireKey) {
    requireApiKey(config)
  }
  return new OpenAICompatibleClient(config)
}

/**
 * Secret store wired to the on-disk audit log.
 *
 * @param requireKey - false for operations that never call the model
 */
export async function openSecretStore(dir: string = getConfigDir(), requireKey = true): Promise<SecretStore> {
  const llm = await loadClient(dir, requireKey)
  const audit = new AuditLogger(dir)
  return new SecretStore(llm, { dir, onAudit: audit.handler() })
}
