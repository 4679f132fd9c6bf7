import { z } from 'zod';
import { NormalizationError } from '../types/index.js';
import { hashString } from '../utils/hash.js';
import { foldForComparison, sanitizeText } from '../utils/text-sanitizer.js';
import type {
  ActionType,
  EnforcementFields,
  EnforcementRecord,
  NormalizationResult,
  RawCandidate,
  RejectedCandidate,
} from './types.js';

/**
 * Shape accepted from a source adapter. Everything is optional here;
 * required fields are checked explicitly so the error names the field.
 */
const RawCandidateSchema = z.object({
  organization: z.string().nullish(),
  title: z.string().nullish(),
  date: z.string().nullish(),
  url: z.string().nullish(),
  reference: z.string().nullish(),
  type: z.string().nullish(),
  penalty: z.string().nullish(),
  description: z.string().nullish(),
  summary: z.string().nullish(),
  pdfUrl: z.string().nullish(),
});

type ParsedCandidate = z.infer<typeof RawCandidateSchema>;

const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const ACTION_TYPES: readonly ActionType[] = [
  'monetary-penalty',
  'enforcement-notice',
  'undertaking',
  'prosecution',
  'reprimand',
  'other',
];

/**
 * Path segments used by the ICO media library, plus plural labels seen on list pages
 */
const ACTION_TYPE_ALIASES = new Map<string, ActionType>([
  ['mpns', 'monetary-penalty'],
  ['monetary-penalties', 'monetary-penalty'],
  ['enforcement-notices', 'enforcement-notice'],
  ['undertakings', 'undertaking'],
  ['prosecutions', 'prosecution'],
  ['reprimands', 'reprimand'],
]);

const PENALTY_PATTERN = /£\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?(?:\s?(million|m|k)\b)?/i;

/**
 * Parse a date as printed by regulator pages into YYYY-MM-DD.
 * Numeric dates are read day first.
 */
export function parseActionDate(input: string): string | undefined {
  const text = sanitizeText(input);
  let year: number;
  let month: number | undefined;
  let day: number;

  let match = text.match(/^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/i);
  if (match) {
    day = Number(match[1]);
    month = MONTHS[match[2].toLowerCase()];
    year = Number(match[3]);
  } else if ((match = text.match(/^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i))) {
    month = MONTHS[match[1].toLowerCase()];
    day = Number(match[2]);
    year = Number(match[3]);
  } else if ((match = text.match(/^(\d{4})-(\d{2})-(\d{2})(?:T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/))) {
    year = Number(match[1]);
    month = Number(match[2]);
    day = Number(match[3]);
  } else if ((match = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/))) {
    day = Number(match[1]);
    month = Number(match[2]);
    year = Number(match[3]);
  } else {
    return undefined;
  }

  if (month === undefined) {
    return undefined;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  return date.toISOString().slice(0, 10);
}

/**
 * First pound amount in the text, in whole pounds
 */
export function parsePenaltyAmount(text: string): number | undefined {
  const match = text.match(PENALTY_PATTERN);
  if (!match) {
    return undefined;
  }

  const whole = match[1].replace(/,/g, '');
  const amount = parseFloat(match[2] ? `${whole}.${match[2]}` : whole);
  const unit = match[3]?.toLowerCase();
  const multiplier = unit === 'million' || unit === 'm' ? 1_000_000 : unit === 'k' ? 1_000 : 1;

  return Math.round(amount * multiplier);
}

function parseAbsoluteUrl(value: string): URL | undefined {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
  } catch {
    return undefined;
  }
}

function resolveActionType(type: string | undefined, pdfUrl: string | undefined): ActionType {
  if (type) {
    const slug = foldForComparison(type).replace(/\s+/g, '-');
    const direct = ACTION_TYPES.find((candidate) => candidate === slug);
    if (direct) {
      return direct;
    }
    const alias = ACTION_TYPE_ALIASES.get(slug);
    if (alias) {
      return alias;
    }
  }

  const segment = pdfUrl?.match(/\/action-weve-taken\/([^/]+)\//)?.[1];
  const fromPdfPath = segment ? ACTION_TYPE_ALIASES.get(segment) : undefined;
  if (fromPdfPath) {
    return fromPdfPath;
  }

  return 'other';
}

/**
 * Hash of the folded identity fields. Case and whitespace differences in
 * the source text do not change the key.
 */
export function deriveIdentityKey(organization: string, date: string, reference: string): string {
  return hashString([organization, date, reference].map(foldForComparison).join('|'));
}

function optionalText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const text = sanitizeText(value);
  return text === '' ? undefined : text;
}

function buildFields(candidate: ParsedCandidate): EnforcementFields | NormalizationError {
  const organization = optionalText(candidate.organization) ?? optionalText(candidate.title);
  if (!organization) {
    return new NormalizationError('Missing organization', 'organization');
  }

  const rawDate = optionalText(candidate.date);
  if (!rawDate) {
    return new NormalizationError('Missing date', 'date');
  }
  const date = parseActionDate(rawDate);
  if (!date) {
    return new NormalizationError(`Unparseable date: ${rawDate}`, 'date', { date: rawDate });
  }

  const rawUrl = optionalText(candidate.url);
  if (!rawUrl) {
    return new NormalizationError('Missing url', 'url');
  }
  const url = parseAbsoluteUrl(rawUrl);
  if (!url) {
    return new NormalizationError(`Not an absolute http(s) URL: ${rawUrl}`, 'url', { url: rawUrl });
  }

  const reference =
    optionalText(candidate.reference) ?? url.pathname.split('/').filter(Boolean).pop();
  if (!reference) {
    return new NormalizationError(`No reference and no path in ${rawUrl}`, 'reference');
  }

  const summary = optionalText(candidate.summary) ?? optionalText(candidate.description);
  const penaltyText = optionalText(candidate.penalty);
  const penaltyAmount =
    (penaltyText ? parsePenaltyAmount(penaltyText) : undefined) ??
    (summary ? parsePenaltyAmount(summary) : undefined);

  const pdfText = optionalText(candidate.pdfUrl);
  const pdfUrl = pdfText ? parseAbsoluteUrl(pdfText)?.href : undefined;

  const fields: EnforcementFields = {
    organization,
    date,
    reference,
    actionType: resolveActionType(optionalText(candidate.type), pdfUrl),
    url: url.href,
  };
  if (penaltyAmount !== undefined) {
    fields.penaltyAmount = penaltyAmount;
  }
  if (summary) {
    fields.summary = summary;
  }
  if (pdfUrl) {
    fields.pdfUrl = pdfUrl;
  }
  return fields;
}

/**
 * Turn one raw candidate into a canonical record. Pure: no I/O.
 */
export function normalizeCandidate(raw: unknown, runId: string): NormalizationResult {
  const parsed = RawCandidateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || undefined;
    return {
      ok: false,
      error: new NormalizationError(
        `Malformed candidate${field ? ` field ${field}` : ''}: ${issue?.message ?? 'invalid input'}`,
        field,
        parsed.error.issues
      ),
    };
  }

  const fields = buildFields(parsed.data);
  if (fields instanceof NormalizationError) {
    return { ok: false, error: fields };
  }

  return {
    ok: true,
    record: {
      identityKey: deriveIdentityKey(fields.organization, fields.date, fields.reference),
      fields,
      firstSeenRunId: runId,
    },
  };
}

/**
 * Normalize a batch, keeping source order and the index of every rejection
 */
export function normalizeCandidates(
  raws: readonly RawCandidate[],
  runId: string
): { records: EnforcementRecord[]; rejected: RejectedCandidate[] } {
  const records: EnforcementRecord[] = [];
  const rejected: RejectedCandidate[] = [];

  raws.forEach((raw, index) => {
    const result = normalizeCandidate(raw, runId);
    if (result.ok) {
      records.push(result.record);
    } else {
      rejected.push({ index, error: result.error });
    }
  });

  return { records, rejected };
}
