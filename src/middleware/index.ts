/**
 * middleware/index.ts: Barrel export for the page-level helpers.
 */

// ── Element resolution ──────────────────────────────────────
export { resolveCandidates } from './candidateResolver';
export type { Resolution } from './candidateResolver';

// ── Single-flight page access ───────────────────────────────
export { serializePage } from './actionQueue';
export type { ActionQueueOptions, SerializedPage } from './actionQueue';
