import type { ChatMessage } from '../llm/client.js'

/**
 * In-memory history for the interactive ask loop.
 * Nothing is persisted; the history ends with the process.
 */
export class ConversationManager {
  private messages: ChatMessage[] = []

  constructor(private readonly systemPrompt: string) {}

  addUser(content: string): void {
    this.messages.push({ role: 'user', content })
  }

  addAssistant(content: string): void {
    this.messages.push({ role: 'assistant', content })
  }

  /**
   * Drop the last user turn (used when its request failed).
   */
  discardLastUser(): void {
    const last = this.messages[this.messages.length - 1]
    if (last?.role === 'user') {
      this.messages.pop()
    }
  }

  /**
   * Messages to send, system prompt first.
   */
  getMessages(): ChatMessage[] {
    return [{ role: 'system', content: this.systemPrompt }, ...this.messages]
  }

  /**
   * The exchanged turns, without the system prompt.
   */
  getHistory(): ChatMessage[] {
    return [...this.messages]
  }

  clear(): void {
    this.messages = []
  }
}
