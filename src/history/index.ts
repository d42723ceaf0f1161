/**
 * Conversation history module
 */

export {
  SESSION_TITLE_LENGTH,
  sessionTitle,
  type AppendOptions,
  type ConversationStore,
  type SessionSummary,
} from './types.js';
export { HistoryConflictError } from './errors.js';
export { InMemoryConversationStore } from './memory-store.js';
export { SqliteConversationStore, openConversationStore } from './sqlite-store.js';
