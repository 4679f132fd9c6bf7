/**
 * Types for source adapters
 */

import type { RawCandidate } from '../enforcement/types.js';

/**
 * Produces the raw candidates currently listed by a regulator. Transport
 * failures are reported by throwing; the adapter does no validation.
 */
export interface SourceAdapter {
  readonly name: string;
  fetchCandidates(): Promise<RawCandidate[]>;
}
