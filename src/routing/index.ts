export { Router, route, selectTier, SAFER_TIER } from './router'
export type { MemoryPresence, RouteDecision, RouteReason, FallbackOutcome, ExecuteOptions, RouterOptions } from './router'
