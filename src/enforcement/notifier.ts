import { errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { characterCount, truncateText } from '../utils/text-sanitizer.js';
import type { PublishImage, PublishTransport } from '../publishing/types.js';
import type {
  ActionType,
  CardRenderer,
  EnforcementFields,
  EnforcementRecord,
  NotificationOutcome,
} from './types.js';

const logger = createChildLogger('notifier');

const SEPARATOR = '\n\n';

/** Below this the summary is dropped rather than cut to a stub */
const MIN_SUMMARY_LENGTH = 40;
const MIN_HEADLINE_LENGTH = 20;

const ACTION_LABELS: Record<ActionType, string> = {
  'monetary-penalty': 'Monetary penalty',
  'enforcement-notice': 'Enforcement notice',
  undertaking: 'Undertaking',
  prosecution: 'Prosecution',
  reprimand: 'Reprimand',
  other: 'Enforcement action',
};

const poundFormatter = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const dateFormatter = new Intl.DateTimeFormat('en-GB', {
  day: 'numeric',
  month: 'long',
  year: 'numeric',
  timeZone: 'UTC',
});

export function formatPenalty(amount: number): string {
  return poundFormatter.format(amount);
}

/**
 * ISO date as "1 March 2024"
 */
export function formatActionDate(date: string): string {
  return dateFormatter.format(new Date(`${date}T00:00:00Z`));
}

/**
 * e.g. "Monetary penalty: Acme Ltd (£500,000), 1 March 2024"
 */
export function formatHeadline(fields: EnforcementFields): string {
  const penalty =
    fields.penaltyAmount !== undefined ? ` (${formatPenalty(fields.penaltyAmount)})` : '';
  const date = formatActionDate(fields.date);
  return `${ACTION_LABELS[fields.actionType]}: ${fields.organization}${penalty}, ${date}`;
}

/**
 * Post text for a record, at most `maxLength` characters.
 *
 * The summary is shortened first, then dropped; the URL is only cut when
 * the limit leaves no room for even a short headline beside it.
 */
export function formatRecordSummary(record: EnforcementRecord, maxLength: number): string {
  const { fields } = record;
  const headline = formatHeadline(fields);
  const parts = fields.summary ? [headline, fields.summary, fields.url] : [headline, fields.url];

  const full = parts.join(SEPARATOR);
  if (characterCount(full) <= maxLength) {
    return full;
  }

  const urlLength = characterCount(fields.url);
  const summaryRoom = maxLength - characterCount(headline) - urlLength - 2 * SEPARATOR.length;
  if (fields.summary && summaryRoom >= MIN_SUMMARY_LENGTH) {
    return [headline, truncateText(fields.summary, summaryRoom), fields.url].join(SEPARATOR);
  }

  const headlineRoom = maxLength - urlLength - SEPARATOR.length;
  if (headlineRoom >= MIN_HEADLINE_LENGTH) {
    return [truncateText(headline, headlineRoom), fields.url].join(SEPARATOR);
  }

  return truncateText(headline, maxLength);
}

/**
 * Announces records through a transport and reports each outcome.
 * Performs no deduplication; the caller decides what is eligible.
 */
export class Notifier {
  constructor(
    private transport: PublishTransport,
    private renderCard?: CardRenderer
  ) {}

  get transportName(): string {
    return this.transport.name;
  }

  async publish(record: EnforcementRecord): Promise<NotificationOutcome> {
    const text = formatRecordSummary(record, this.transport.maxLength);
    const image = await this.cardFor(record);

    try {
      await this.transport.publish(text, { idempotencyKey: record.identityKey, image });
      logger.info(
        {
          identityKey: record.identityKey,
          organization: record.fields.organization,
          transport: this.transport.name,
          withImage: image !== undefined,
        },
        'Published notification'
      );
      return { status: 'sent' };
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn(
        { identityKey: record.identityKey, transport: this.transport.name, error: reason },
        'Notification failed'
      );
      return { status: 'failed', reason };
    }
  }

  /**
   * A card that fails to render leaves the post text-only
   */
  private async cardFor(record: EnforcementRecord): Promise<PublishImage | undefined> {
    if (!this.renderCard) {
      return undefined;
    }
    try {
      return await this.renderCard(record);
    } catch (error) {
      logger.warn(
        { identityKey: record.identityKey, error: errorMessage(error) },
        'Could not render image card; posting text only'
      );
      return undefined;
    }
  }
}

export function createNotifier(transport: PublishTransport, renderCard?: CardRenderer): Notifier {
  return new Notifier(transport, renderCard);
}
