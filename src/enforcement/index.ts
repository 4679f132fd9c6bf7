/**
 * Enforcement Change-Detection Module
 *
 * Normalizes scraped enforcement actions, works out which are new against
 * the record store, persists the whole listing and announces the new ones.
 */

// Types
export type * from './types.js';

// Pipeline stages
export {
  normalizeCandidate,
  normalizeCandidates,
  deriveIdentityKey,
  parseActionDate,
  parsePenaltyAmount,
} from './normalizer.js';
export { diffCandidates } from './diff-engine.js';
export {
  Notifier,
  createNotifier,
  formatActionDate,
  formatHeadline,
  formatPenalty,
  formatRecordSummary,
} from './notifier.js';
export { buildCardLayout, renderCardSvg, renderImageCard } from './image-card.js';
export type { CardLayout } from './image-card.js';

// Store
export { PostgresRecordStore, createRecordStore } from './record-store.js';
export type { RecordStore, Queryable } from './record-store.js';

// Coordinator
export { RunCoordinator, createRunCoordinator, createRunId } from './run-coordinator.js';
export type { RunCoordinatorDeps } from './run-coordinator.js';
