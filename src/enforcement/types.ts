/**
 * Types for the enforcement change-detection pipeline
 */

import type { PublishImage } from '../publishing/types.js';
import type { NormalizationError } from '../types/index.js';

/**
 * Untrusted mapping produced by a source adapter
 */
export type RawCandidate = Record<string, unknown>;

/**
 * Kind of regulatory action
 */
export type ActionType =
  | 'monetary-penalty'
  | 'enforcement-notice'
  | 'undertaking'
  | 'prosecution'
  | 'reprimand'
  | 'other';

/**
 * Display attributes of an action. Never consulted when deciding novelty.
 */
export interface EnforcementFields {
  organization: string;
  /** ISO date, YYYY-MM-DD */
  date: string;
  reference: string;
  actionType: ActionType;
  /** Whole pounds */
  penaltyAmount?: number;
  summary?: string;
  url: string;
  pdfUrl?: string;
}

/**
 * Canonical form of one enforcement action
 */
export interface EnforcementRecord {
  /** Stable across runs for the same action */
  identityKey: string;
  fields: EnforcementFields;
  /** Run in which the record was first persisted; never rewritten */
  firstSeenRunId: string;
}

export type NormalizationResult =
  | { ok: true; record: EnforcementRecord }
  | { ok: false; error: NormalizationError };

export interface RejectedCandidate {
  /** Position in the adapter's output */
  index: number;
  error: NormalizationError;
}

export type Classification =
  | { status: 'new'; record: EnforcementRecord }
  | { status: 'known'; reason: 'stored' | 'duplicate_in_run'; record: EnforcementRecord };

export interface DiffResult {
  /** One entry per candidate, in source order */
  classifications: Classification[];
  /** Absent from the store and first of their key in this run */
  newRecords: EnforcementRecord[];
  /** Present in the store before this run */
  knownRecords: EnforcementRecord[];
  /** Later occurrences of a key already seen in this run */
  duplicates: EnforcementRecord[];
  /** First occurrence of every key, new and known */
  uniqueRecords: EnforcementRecord[];
}

/**
 * Produces the picture posted with a record, or nothing when the record has none
 */
export type CardRenderer = (record: EnforcementRecord) => Promise<PublishImage | undefined>;

export type NotificationOutcome = { status: 'sent' } | { status: 'failed'; reason: string };

/**
 * Delivery state recorded against a stored record
 */
export type DeliveryStatus = 'pending' | 'sent' | 'failed' | 'skipped';

/**
 * What happened to a new record's announcement
 */
export type DeliveryOutcome = NotificationOutcome | { status: 'skipped' };

export type UpsertOutcome = 'inserted' | 'refreshed';

/**
 * Pipeline states; FAILED is reachable from any state before DONE
 */
export type RunState =
  | 'FETCHING'
  | 'NORMALIZING'
  | 'DIFFING'
  | 'PERSISTING'
  | 'NOTIFYING'
  | 'DONE'
  | 'FAILED';

export interface RunOptions {
  /** Stop after diffing; no writes and no posts */
  dryRun?: boolean;
  /** When false, new records are stored with delivery 'skipped' and nothing is posted */
  announce?: boolean;
}

export interface RunSummary {
  runId: string;
  state: 'DONE' | 'FAILED';
  dryRun: boolean;
  /** Stage that was active when the run failed */
  failedDuring?: RunState;
  error?: { kind: string; message: string };
  /** Candidates delivered by the source adapter */
  fetched: number;
  /** Candidates that normalized successfully */
  candidates: number;
  rejected: RejectedCandidate[];
  newKeys: string[];
  duplicates: number;
  /** Upserts completed, including those before a store failure */
  stored: number;
  inserted: number;
  refreshed: number;
  notificationOutcomes: Record<string, NotificationOutcome>;
  sent: number;
  failed: number;
  /** New records stored without being announced */
  skipped: number;
  startedAt: Date;
  completedAt: Date;
}
