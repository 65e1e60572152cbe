import { SubtitleFormatError } from './errors';
import { parseNumber } from './format';
import {
  AssDocument,
  AssEvent,
  AssStyle,
  DocumentLine,
  FieldRecord,
  LinePatch,
  ScriptInfo,
} from './types';

const BOM = '\uFEFF';

const DEFAULT_V4_PLUS_STYLE_FORMAT = [
  'Name', 'Fontname', 'Fontsize', 'PrimaryColour', 'SecondaryColour', 'OutlineColour',
  'BackColour', 'Bold', 'Italic', 'Underline', 'StrikeOut', 'ScaleX', 'ScaleY', 'Spacing',
  'Angle', 'BorderStyle', 'Outline', 'Shadow', 'Alignment', 'MarginL', 'MarginR', 'MarginV',
  'Encoding',
];

const DEFAULT_V4_STYLE_FORMAT = [
  'Name', 'Fontname', 'Fontsize', 'PrimaryColour', 'SecondaryColour', 'TertiaryColour',
  'BackColour', 'Bold', 'Italic', 'BorderStyle', 'Outline', 'Shadow', 'Alignment', 'MarginL',
  'MarginR', 'MarginV', 'AlphaLevel', 'Encoding',
];

const DEFAULT_EVENT_FORMAT = [
  'Layer', 'Start', 'End', 'Style', 'Name', 'MarginL', 'MarginR', 'MarginV', 'Effect', 'Text',
];

const EVENT_TYPES = ['dialogue', 'comment', 'picture', 'sound', 'movie', 'command'];

type Section = 'info' | 'styles' | 'events' | 'other';

function toFieldNames(names: string[]): string[] {
  return names.map((name) => name.trim().toLowerCase());
}

/**
 * Splits "a,b,c" into at most `count` values; the last value keeps any
 * remaining commas (event text may contain them)
 */
export function splitFields(rest: string, count: number): string[] {
  const values: string[] = [];
  let remaining = rest;

  while (values.length < count - 1) {
    const comma = remaining.indexOf(',');
    if (comma === -1) break;
    values.push(remaining.slice(0, comma));
    remaining = remaining.slice(comma + 1);
  }

  values.push(remaining);
  return values;
}

function splitLines(body: string): DocumentLine[] {
  const raw = body.split('\n');
  return raw.map((segment, index) => {
    const isLast = index === raw.length - 1;
    if (segment.endsWith('\r')) {
      return { text: segment.slice(0, -1), eol: isLast ? '\r' : '\r\n' };
    }
    return { text: segment, eol: isLast ? '' : '\n' };
  });
}

function sectionOf(header: string): Section {
  const name = header.toLowerCase();
  if (name === 'script info') return 'info';
  if (name === 'v4+ styles' || name === 'v4 styles' || name === 'v4 styles+') return 'styles';
  if (name === 'events') return 'events';
  return 'other';
}

function readKeyValue(text: string): { key: string; prefix: string; rest: string } | null {
  const match = text.match(/^([^:;][^:]*?)\s*:\s*/);
  if (!match?.[1]) return null;
  return { key: match[1].trim().toLowerCase(), prefix: match[0], rest: text.slice(match[0].length) };
}

/**
 * Parses an ASS/SSA script into an immutable document value
 * @param content - Raw file content
 */
export function parseAssDocument(content: string): AssDocument {
  const bom = content.startsWith(BOM);
  const lines = splitLines(bom ? content.slice(BOM.length) : content);

  const scriptInfo: ScriptInfo = {};
  const playResLines: AssDocument['playResLines'] = {};
  const styles: AssStyle[] = [];
  const events: AssEvent[] = [];
  let scriptInfoHeader: number | null = null;

  let section: Section = 'other';
  let styleFormat: string[] = toFieldNames(DEFAULT_V4_PLUS_STYLE_FORMAT);
  let eventFormat: string[] = toFieldNames(DEFAULT_EVENT_FORMAT);

  for (const [lineIndex, { text }] of lines.entries()) {
    const trimmed = text.trim();
    const header = trimmed.match(/^\[(.+)\]$/);

    if (header?.[1]) {
      section = sectionOf(header[1].trim());
      if (section === 'info' && scriptInfoHeader === null) {
        scriptInfoHeader = lineIndex;
      }
      if (section === 'styles' && header[1].trim().toLowerCase() === 'v4 styles') {
        styleFormat = toFieldNames(DEFAULT_V4_STYLE_FORMAT);
      }
      continue;
    }

    const entry = readKeyValue(text);
    if (!entry) continue;

    if (section === 'info') {
      if (entry.key === 'playresx') {
        scriptInfo.playResX = parseNumber(entry.rest) ?? undefined;
        playResLines.x = lineIndex;
      } else if (entry.key === 'playresy') {
        scriptInfo.playResY = parseNumber(entry.rest) ?? undefined;
        playResLines.y = lineIndex;
      } else if (entry.key === 'timer') {
        scriptInfo.timer = entry.rest.trim();
      }
      continue;
    }

    if (section === 'styles') {
      if (entry.key === 'format') {
        styleFormat = toFieldNames(entry.rest.split(','));
      } else if (entry.key === 'style') {
        const values = splitFields(entry.rest, styleFormat.length);
        const nameIndex = styleFormat.indexOf('name');
        styles.push({
          lineIndex,
          prefix: entry.prefix,
          values,
          fieldNames: styleFormat,
          name: (nameIndex >= 0 ? values[nameIndex] : undefined)?.trim() ?? '',
        });
      }
      continue;
    }

    if (section === 'events') {
      if (entry.key === 'format') {
        eventFormat = toFieldNames(entry.rest.split(','));
      } else if (EVENT_TYPES.includes(entry.key)) {
        events.push({
          lineIndex,
          prefix: entry.prefix,
          values: splitFields(entry.rest, eventFormat.length),
          fieldNames: eventFormat,
          type: entry.key,
        });
      }
    }
  }

  return { bom, lines, scriptInfo, scriptInfoHeader, playResLines, styles, events };
}

/**
 * Reads a named field from a record
 * @throws SubtitleFormatError when the record has no such field
 */
export function getField(record: FieldRecord, field: string): string {
  const index = record.fieldNames.indexOf(field);
  const value = index >= 0 ? record.values[index] : undefined;
  if (value === undefined) {
    throw new SubtitleFormatError(`Missing ${field} field on line ${record.lineIndex + 1}`);
  }
  return value;
}

export function hasField(record: FieldRecord, field: string): boolean {
  const index = record.fieldNames.indexOf(field);
  return index >= 0 && index < record.values.length;
}

/**
 * Rebuilds a record's line with some fields replaced; other fields keep
 * their original text, spacing included
 */
export function renderRecord(
  record: FieldRecord,
  updates: Partial<Record<string, string>>
): string {
  const values = record.values.map((value, index) => {
    const name = record.fieldNames[index];
    return (name !== undefined ? updates[name] : undefined) ?? value;
  });
  return `${record.prefix}${values.join(',')}`;
}

/**
 * Converts an ASS timestamp (H:MM:SS.cc) to milliseconds
 * @throws SubtitleFormatError on malformed input
 */
export function assTimestampToMs(timestamp: string): number {
  const match = timestamp.trim().match(/^(\d+):(\d{1,2}):(\d{1,2})[.:](\d{1,3})$/);
  if (!match?.[1] || !match[2] || !match[3] || !match[4]) {
    throw new SubtitleFormatError(`Invalid ASS timestamp: ${timestamp}`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseInt(match[3], 10);
  const fraction = parseInt(match[4].padEnd(3, '0'), 10);

  return (hours * 3600 + minutes * 60 + seconds) * 1000 + fraction;
}

/**
 * Converts milliseconds to an ASS timestamp, truncating to centiseconds
 */
export function msToAssTimestamp(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const seconds = Math.floor((total % 60000) / 1000);
  const centiseconds = Math.floor((total % 1000) / 10);

  return (
    `${hours}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${seconds.toString().padStart(2, '0')}.` +
    `${centiseconds.toString().padStart(2, '0')}`
  );
}

/**
 * Serializes a document with the given patches applied. Lines that are not
 * patched are written back exactly as read.
 */
export function serializeAssDocument(doc: AssDocument, patches: readonly LinePatch[] = []): string {
  const replacements = new Map<number, string>();
  const insertions = new Map<number, string[]>();

  for (const patch of patches) {
    if (patch.type === 'replace') {
      replacements.set(patch.lineIndex, patch.text);
    } else {
      const pending = insertions.get(patch.lineIndex) ?? [];
      pending.push(patch.text);
      insertions.set(patch.lineIndex, pending);
    }
  }

  const defaultEol = doc.lines.find((line) => line.eol)?.eol ?? '\n';
  let output = doc.bom ? BOM : '';

  doc.lines.forEach((line, index) => {
    output += (replacements.get(index) ?? line.text) + line.eol;

    const inserted = insertions.get(index);
    if (inserted) {
      if (!line.eol) output += defaultEol;
      output += inserted.map((text) => text + defaultEol).join('');
    }
  });

  return output;
}
