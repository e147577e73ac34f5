// Engine
export * from './engine'

// Components
export * from './catalog'
export * from './classifier'
export * from './memory'
export * from './cache'
export * from './context'
export * from './routing'
export * from './validation'

// Collaborators
export * from './ai'
export * from './embedding'
export * from './storage'

// Ambient
export * from './config'
export * from './observability'
export * from './errors'
export type * from './types'
