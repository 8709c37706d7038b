/**
 * Trim Module - Public exports
 */

// Coordinator
export { trim, trimMessages, normalizeTrimOptions, clampMinTurns, normalizePriorityRoles } from './trim';
export type { TrimOptions, TrimMessagesOptions, NormalizedTrimOptions } from './trim';

// Stages
export { groupTurns } from './turns';
export { allocateBudget, clampTargetTokens, BUDGET_FLOOR } from './budget';
export type { BudgetAllocation } from './budget';
export { selectMessages, selectTurns, selectConversation, strategyFor } from './selector';
export type { SelectionInput, SelectionStrategy } from './selector';
export { computeTrimMetrics, roundTo, COMPRESS_RATIO_PRECISION } from './metrics';
export type { TrimMetricsInput } from './metrics';
