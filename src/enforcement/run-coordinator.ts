import { FetchError, StoreError, WatchError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { SourceAdapter } from '../sources/types.js';
import { diffCandidates } from './diff-engine.js';
import { normalizeCandidates } from './normalizer.js';
import type { Notifier } from './notifier.js';
import type { RecordStore } from './record-store.js';
import type {
  DeliveryOutcome,
  EnforcementRecord,
  NotificationOutcome,
  RawCandidate,
  RejectedCandidate,
  RunOptions,
  RunState,
  RunSummary,
} from './types.js';

const logger = createChildLogger('run-coordinator');

export interface RunCoordinatorDeps {
  source: SourceAdapter;
  store: RecordStore;
  notifier: Notifier;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Progress of the run in flight; discarded once the summary is built
 */
interface Run {
  runId: string;
  state: RunState;
  dryRun: boolean;
  fetched: number;
  candidates: EnforcementRecord[];
  rejected: RejectedCandidate[];
  newKeys: string[];
  duplicates: number;
  stored: number;
  inserted: number;
  refreshed: number;
  notificationOutcomes: Record<string, NotificationOutcome>;
  skipped: number;
  startedAt: Date;
}

/**
 * Timestamp-derived run id, e.g. 20240301T093000123Z. Sorts chronologically.
 */
export function createRunId(now: Date = new Date()): string {
  return now.toISOString().replace(/[-:.]/g, '');
}

/**
 * Drives one pass of fetch, normalize, diff, persist, notify.
 *
 * Every candidate is upserted before the first publish call, so a crash
 * after persisting can lose an announcement but can never repeat one.
 */
export class RunCoordinator {
  private source: SourceAdapter;
  private store: RecordStore;
  private notifier: Notifier;
  private now: () => Date;

  constructor(deps: RunCoordinatorDeps) {
    this.source = deps.source;
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.now = deps.now ?? (() => new Date());
  }

  async runOnce(options: RunOptions = {}): Promise<RunSummary> {
    const announce = options.announce ?? true;
    const startedAt = this.now();
    const run: Run = {
      runId: createRunId(startedAt),
      state: 'FETCHING',
      dryRun: options.dryRun ?? false,
      fetched: 0,
      candidates: [],
      rejected: [],
      newKeys: [],
      duplicates: 0,
      stored: 0,
      inserted: 0,
      refreshed: 0,
      notificationOutcomes: {},
      skipped: 0,
      startedAt,
    };

    logger.info(
      { runId: run.runId, source: this.source.name, dryRun: run.dryRun, announce },
      'Starting run'
    );

    let raws: RawCandidate[];
    try {
      raws = await this.source.fetchCandidates();
    } catch (error) {
      const fetchError =
        error instanceof FetchError ? error : new FetchError(errorMessage(error), error);
      return this.fail(run, fetchError);
    }
    run.fetched = raws.length;

    this.transition(run, 'NORMALIZING');
    const { records, rejected } = normalizeCandidates(raws, run.runId);
    run.candidates = records;
    run.rejected = rejected;
    for (const { index, error } of rejected) {
      logger.warn(
        { runId: run.runId, index, field: error.field, error: error.message },
        'Skipping candidate that failed normalization'
      );
    }

    this.transition(run, 'DIFFING');
    let knownKeys: Set<string>;
    try {
      knownKeys = await this.store.knownKeys();
    } catch (error) {
      return this.fail(run, this.toStoreError(error));
    }
    const diff = diffCandidates(records, knownKeys);
    run.newKeys = diff.newRecords.map((record) => record.identityKey);
    run.duplicates = diff.duplicates.length;

    logger.info(
      {
        runId: run.runId,
        candidates: records.length,
        new: diff.newRecords.length,
        known: diff.knownRecords.length,
        duplicates: diff.duplicates.length,
      },
      'Diff complete'
    );

    if (run.dryRun) {
      for (const record of diff.newRecords) {
        logger.info(
          { runId: run.runId, identityKey: record.identityKey, organization: record.fields.organization },
          'Dry run: would announce'
        );
      }
      return this.complete(run);
    }

    this.transition(run, 'PERSISTING');
    for (const record of diff.uniqueRecords) {
      try {
        const outcome = await this.store.upsert(record);
        run.stored++;
        if (outcome === 'inserted') {
          run.inserted++;
        } else {
          run.refreshed++;
        }
      } catch (error) {
        logger.error(
          {
            runId: run.runId,
            stored: run.stored,
            total: diff.uniqueRecords.length,
            identityKey: record.identityKey,
          },
          'Persist phase incomplete: store state is ambiguous and needs manual reconciliation; nothing was announced'
        );
        return this.fail(run, this.toStoreError(error));
      }
    }

    this.transition(run, 'NOTIFYING');
    for (const record of diff.newRecords) {
      if (!announce) {
        run.skipped++;
        await this.recordDelivery(run, record.identityKey, { status: 'skipped' });
        continue;
      }

      const outcome = await this.notifier.publish(record);
      run.notificationOutcomes[record.identityKey] = outcome;
      await this.recordDelivery(run, record.identityKey, outcome);
    }

    return this.complete(run);
  }

  private transition(run: Run, next: RunState): void {
    logger.debug({ runId: run.runId, from: run.state, to: next }, 'Run state change');
    run.state = next;
  }

  private toStoreError(error: unknown): StoreError {
    return error instanceof StoreError ? error : new StoreError(errorMessage(error), error);
  }

  /**
   * Delivery bookkeeping only. The post already happened, so a store
   * failure here is logged and the run carries on.
   */
  private async recordDelivery(run: Run, identityKey: string, outcome: DeliveryOutcome): Promise<void> {
    try {
      await this.store.recordDelivery(identityKey, outcome);
    } catch (error) {
      logger.error(
        { runId: run.runId, identityKey, delivery: outcome.status, error: errorMessage(error) },
        'Could not record delivery outcome'
      );
    }
  }

  private fail(run: Run, error: WatchError): RunSummary {
    const failedDuring = run.state;
    logger.error(
      { runId: run.runId, failedDuring, kind: error.name, error: error.message },
      'Run failed'
    );
    run.state = 'FAILED';
    return this.summarize(run, 'FAILED', { failedDuring, error: { kind: error.name, message: error.message } });
  }

  private complete(run: Run): RunSummary {
    this.transition(run, 'DONE');
    const summary = this.summarize(run, 'DONE');

    if (summary.failed > 0) {
      const gaps = Object.entries(summary.notificationOutcomes)
        .filter(([, outcome]) => outcome.status === 'failed')
        .map(([identityKey]) => identityKey);
      logger.warn(
        { runId: run.runId, deliveryGaps: summary.failed, identityKeys: gaps },
        `${summary.failed} record(s) stored but not announced; they will not be retried`
      );
    }

    logger.info(
      {
        runId: run.runId,
        fetched: summary.fetched,
        candidates: summary.candidates,
        rejected: summary.rejected.length,
        new: summary.newKeys.length,
        stored: summary.stored,
        sent: summary.sent,
        failed: summary.failed,
        skipped: summary.skipped,
        durationMs: summary.completedAt.getTime() - summary.startedAt.getTime(),
      },
      'Run complete'
    );

    return summary;
  }

  private summarize(
    run: Run,
    state: RunSummary['state'],
    failure: Pick<RunSummary, 'failedDuring' | 'error'> = {}
  ): RunSummary {
    const outcomes = Object.values(run.notificationOutcomes);
    return {
      runId: run.runId,
      state,
      dryRun: run.dryRun,
      ...failure,
      fetched: run.fetched,
      candidates: run.candidates.length,
      rejected: run.rejected,
      newKeys: run.newKeys,
      duplicates: run.duplicates,
      stored: run.stored,
      inserted: run.inserted,
      refreshed: run.refreshed,
      notificationOutcomes: run.notificationOutcomes,
      sent: outcomes.filter((outcome) => outcome.status === 'sent').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
      skipped: run.skipped,
      startedAt: run.startedAt,
      completedAt: this.now(),
    };
  }
}

/**
 * Create a run coordinator from its collaborators
 */
export function createRunCoordinator(deps: RunCoordinatorDeps): RunCoordinator {
  return new RunCoordinator(deps);
}
