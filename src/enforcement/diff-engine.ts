import type { Classification, DiffResult, EnforcementRecord } from './types.js';

/**
 * Partition a run's candidates against the keys already in the store.
 *
 * Only the first occurrence of a key can be new; later occurrences in the
 * same run are classified as known so a repeated listing never produces a
 * second notification. Neither input is mutated.
 */
export function diffCandidates(
  candidates: readonly EnforcementRecord[],
  knownKeys: ReadonlySet<string>
): DiffResult {
  const seenInRun = new Set<string>();
  const classifications: Classification[] = [];
  const newRecords: EnforcementRecord[] = [];
  const knownRecords: EnforcementRecord[] = [];
  const duplicates: EnforcementRecord[] = [];
  const uniqueRecords: EnforcementRecord[] = [];

  for (const record of candidates) {
    if (seenInRun.has(record.identityKey)) {
      duplicates.push(record);
      classifications.push({ status: 'known', reason: 'duplicate_in_run', record });
      continue;
    }
    seenInRun.add(record.identityKey);
    uniqueRecords.push(record);

    if (knownKeys.has(record.identityKey)) {
      knownRecords.push(record);
      classifications.push({ status: 'known', reason: 'stored', record });
    } else {
      newRecords.push(record);
      classifications.push({ status: 'new', record });
    }
  }

  return { classifications, newRecords, knownRecords, duplicates, uniqueRecords };
}
