/**
 * Conversation memory exports
 */

export { ConversationMemory, memoryKey, needsClarification, recentMentionedItems } from './conversation-memory'
export type { ConversationMemoryOptions, MemorySnapshot } from './conversation-memory'
export { deriveProfile, extractName, extractTopics, extractTurnSignals, hasKnownProfile } from './signal-extraction'
