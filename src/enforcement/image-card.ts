import sharp from 'sharp';
import type { PublishImage } from '../publishing/types.js';
import { createChildLogger } from '../utils/logger.js';
import { formatActionDate, formatHeadline, formatPenalty } from './notifier.js';
import type { EnforcementFields, EnforcementRecord } from './types.js';

const logger = createChildLogger('image-card');

export const CARD_WIDTH = 1200;
export const CARD_HEIGHT = 675;

const LEFT_MARGIN = 100;
const RIGHT_MARGIN = 50;

const TITLE_TOP = 50;
const TITLE_FONT_SIZE = 56;
const PENALTY_TOP = 160;
const PENALTY_FONT_SIZE = 120;
const DESCRIPTION_TOP = 350;
const DESCRIPTION_FONT_SIZE = 35;
const DESCRIPTION_LINE_SPACING = 45;
const DESCRIPTION_WIDTH = 800;
const DESCRIPTION_MAX_LINES = 4;
const DATE_TOP = 550;
const DATE_FONT_SIZE = 45;

const FONT_FAMILY = "'DejaVu Sans Mono', 'Liberation Mono', Menlo, monospace";

/**
 * Text placed on a card
 */
export interface CardLayout {
  title: string;
  penalty?: string;
  descriptionLines: string[];
  date: string;
}

/**
 * Characters of the monospaced card font that fit in `width` pixels.
 * A glyph advance is 3/5 of the font size.
 */
export function charactersPerLine(width: number, fontSize: number): number {
  return Math.floor((width * 5) / (fontSize * 3));
}

/**
 * Greedy word wrap to at most `width` characters per line
 */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';

  for (const word of text.split(' ').filter(Boolean)) {
    const longer = line ? `${line} ${word}` : word;
    if (longer.length > width && line) {
      lines.push(line);
      line = word;
    } else {
      line = longer;
    }
  }
  if (line) {
    lines.push(line);
  }
  return lines;
}

/**
 * Card text for a record; undefined when there is no summary to show
 */
export function buildCardLayout(fields: EnforcementFields): CardLayout | undefined {
  if (!fields.summary) {
    return undefined;
  }

  const titleWidth = charactersPerLine(CARD_WIDTH - LEFT_MARGIN - RIGHT_MARGIN, TITLE_FONT_SIZE);
  const organization = fields.organization.toUpperCase();
  const title =
    organization.length <= titleWidth ? organization : `${organization.slice(0, titleWidth - 1)}…`;

  let descriptionLines = wrapWords(
    fields.summary,
    charactersPerLine(DESCRIPTION_WIDTH, DESCRIPTION_FONT_SIZE)
  );
  if (descriptionLines.length > DESCRIPTION_MAX_LINES) {
    descriptionLines = descriptionLines.slice(0, DESCRIPTION_MAX_LINES);
    const last = descriptionLines[DESCRIPTION_MAX_LINES - 1];
    descriptionLines[DESCRIPTION_MAX_LINES - 1] = `${last.slice(0, -1)}…`;
  }

  const layout: CardLayout = {
    title,
    descriptionLines,
    date: formatActionDate(fields.date).toUpperCase(),
  };
  if (fields.penaltyAmount !== undefined) {
    layout.penalty = formatPenalty(fields.penaltyAmount);
  }
  return layout;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function textElement(text: string, top: number, fontSize: number): string {
  // SVG places text by its baseline
  return `<text x="${LEFT_MARGIN}" y="${top + fontSize}" font-size="${fontSize}">${escapeXml(text)}</text>`;
}

export function renderCardSvg(layout: CardLayout): string {
  const elements = [textElement(layout.title, TITLE_TOP, TITLE_FONT_SIZE)];
  if (layout.penalty) {
    elements.push(textElement(layout.penalty, PENALTY_TOP, PENALTY_FONT_SIZE));
  }
  layout.descriptionLines.forEach((line, index) => {
    elements.push(
      textElement(line, DESCRIPTION_TOP + index * DESCRIPTION_LINE_SPACING, DESCRIPTION_FONT_SIZE)
    );
  });
  elements.push(textElement(layout.date, DATE_TOP, DATE_FONT_SIZE));

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CARD_WIDTH}" height="${CARD_HEIGHT}" viewBox="0 0 ${CARD_WIDTH} ${CARD_HEIGHT}">`,
    `<rect width="${CARD_WIDTH}" height="${CARD_HEIGHT}" fill="#ffffff"/>`,
    `<g font-family="${FONT_FAMILY}" font-weight="bold" fill="#000000">`,
    ...elements,
    '</g>',
    '</svg>',
  ].join('\n');
}

/**
 * PNG card for a record, with the post headline as alt text
 */
export async function renderImageCard(record: EnforcementRecord): Promise<PublishImage | undefined> {
  const layout = buildCardLayout(record.fields);
  if (!layout) {
    logger.debug({ identityKey: record.identityKey }, 'No summary; skipping image card');
    return undefined;
  }

  const data = await sharp(Buffer.from(renderCardSvg(layout))).png().toBuffer();
  return { data, mimeType: 'image/png', description: formatHeadline(record.fields) };
}
