export { ChatEngine } from './chat-engine'
export type { ChatEngineComponents, ChatReply, ChatRequest, ReplyStatus } from './chat-engine'
export { createChatEngine, createChatEngineFromEnv, createRedisStore } from './factory'
export type { ChatEngineOptions } from './factory'
export { generationParams } from './tiers'
export { REPLIES } from './replies'
export type { ReplyTexts } from './replies'
