import { describe, it, expect, vi } from 'vitest';
import { createMockTransport } from '../../tests/helpers/mock-transport.js';
import type { PublishImage } from '../publishing/types.js';
import {
  Notifier,
  formatActionDate,
  formatHeadline,
  formatPenalty,
  formatRecordSummary,
} from './notifier.js';
import type { CardRenderer, EnforcementRecord } from './types.js';

const HEADLINE = 'Enforcement action: Acme Widgets Ltd (£120,000), 1 March 2024';
const SUMMARY =
  'The Commissioner fined Acme Widgets Ltd £120,000 for sending unsolicited marketing texts.';
const LINK = 'https://regulator.example/action-weve-taken/enforcement/acme-widgets-ltd/';

const RECORD: EnforcementRecord = {
  identityKey: 'a'.repeat(64),
  firstSeenRunId: 'run-1',
  fields: {
    organization: 'Acme Widgets Ltd',
    date: '2024-03-01',
    reference: 'acme-widgets-ltd',
    actionType: 'other',
    penaltyAmount: 120000,
    summary: SUMMARY,
    url: LINK,
  },
};

describe('formatPenalty', () => {
  it('should format whole pounds with grouping', () => {
    expect(formatPenalty(120000)).toBe('£120,000');
    expect(formatPenalty(7500000)).toBe('£7,500,000');
  });
});

describe('formatHeadline', () => {
  it('should include type, organization, penalty and date', () => {
    expect(formatHeadline(RECORD.fields)).toBe(HEADLINE);
  });

  it('should omit the penalty when there is none', () => {
    expect(
      formatHeadline({
        organization: 'Cobalt Health Trust',
        date: '2024-01-02',
        reference: 'cobalt-health-trust',
        actionType: 'reprimand',
        url: 'https://regulator.example/action-weve-taken/enforcement/cobalt-health-trust/',
      })
    ).toBe('Reprimand: Cobalt Health Trust, 2 January 2024');
  });
});

describe('formatActionDate', () => {
  it('should write the day without padding and the month in full', () => {
    expect(formatActionDate('2024-03-01')).toBe('1 March 2024');
  });
});

describe('formatRecordSummary', () => {
  it('should return headline, summary and link when they fit', () => {
    expect(formatRecordSummary(RECORD, 500)).toBe(`${HEADLINE}\n\n${SUMMARY}\n\n${LINK}`);
  });

  it('should shorten the summary first', () => {
    const text = formatRecordSummary(RECORD, 200);

    expect(text).toBe(
      `${HEADLINE}\n\nThe Commissioner fined Acme Widgets Ltd £120,000 for sending…\n\n${LINK}`
    );
    expect(text.length).toBeLessThanOrEqual(200);
  });

  it('should drop the summary when too little room is left for it', () => {
    expect(formatRecordSummary(RECORD, 150)).toBe(`${HEADLINE}\n\n${LINK}`);
  });

  it('should shorten the headline before the link', () => {
    expect(formatRecordSummary(RECORD, 100)).toBe(`Enforcement action:…\n\n${LINK}`);
  });

  it('should fall back to a shortened headline alone for very small limits', () => {
    const text = formatRecordSummary(RECORD, 50);

    expect(text).toBe('Enforcement action: Acme Widgets Ltd (£120,000),…');
    expect(text.length).toBeLessThanOrEqual(50);
  });

  it('should work without a summary', () => {
    const { summary: _summary, ...fields } = RECORD.fields;

    expect(formatRecordSummary({ ...RECORD, fields }, 500)).toBe(`${HEADLINE}\n\n${LINK}`);
  });
});

describe('Notifier', () => {
  it('should publish the formatted post with the identity key', async () => {
    const transport = createMockTransport();
    const notifier = new Notifier(transport);

    const outcome = await notifier.publish(RECORD);

    expect(outcome).toEqual({ status: 'sent' });
    expect(transport.posts).toEqual([
      { text: `${HEADLINE}\n\n${SUMMARY}\n\n${LINK}`, idempotencyKey: RECORD.identityKey },
    ]);
  });

  it('should respect the transport length limit', async () => {
    const transport = createMockTransport({ maxLength: 150 });

    await new Notifier(transport).publish(RECORD);

    expect(transport.posts[0].text).toBe(`${HEADLINE}\n\n${LINK}`);
  });

  it('should report a failed delivery instead of throwing', async () => {
    const transport = createMockTransport({ failWhen: () => true });
    const notifier = new Notifier(transport);

    const outcome = await notifier.publish(RECORD);

    expect(outcome).toEqual({ status: 'failed', reason: 'HTTP 429: rate limited' });
    expect(transport.posts).toEqual([]);
  });

  it('should attach the rendered card to the post', async () => {
    const transport = createMockTransport();
    const card: PublishImage = {
      data: Buffer.from('png-bytes'),
      mimeType: 'image/png',
      description: HEADLINE,
    };
    const renderCard = vi.fn<CardRenderer>(async () => card);

    const outcome = await new Notifier(transport, renderCard).publish(RECORD);

    expect(outcome).toEqual({ status: 'sent' });
    expect(renderCard).toHaveBeenCalledWith(RECORD);
    expect(transport.images).toEqual([card]);
    expect(transport.posts).toHaveLength(1);
  });

  it('should post text only when the card cannot be rendered', async () => {
    const transport = createMockTransport();
    const renderCard = vi.fn<CardRenderer>(async () => {
      throw new Error('unsupported font');
    });

    const outcome = await new Notifier(transport, renderCard).publish(RECORD);

    expect(outcome).toEqual({ status: 'sent' });
    expect(transport.posts).toEqual([
      { text: `${HEADLINE}\n\n${SUMMARY}\n\n${LINK}`, idempotencyKey: RECORD.identityKey },
    ]);
    expect(transport.images).toEqual([]);
  });

  it('should expose the transport name', () => {
    expect(new Notifier(createMockTransport()).transportName).toBe('mock');
  });
});
