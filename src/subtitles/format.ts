import path from 'path';
import { SubtitleFormat } from './types';

/** Frame rate assumed when neither the script nor the caller provides one */
export const DEFAULT_FPS = 23.976;

const ASS_EXTENSIONS = ['.ass', '.ssa'];

export function detectSubtitleFormat(filePath: string): SubtitleFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ASS_EXTENSIONS.includes(ext)) return 'ass';
  if (ext === '.srt') return 'srt';
  return 'unsupported';
}

/**
 * Parses a strictly numeric string
 * @returns The number, or null when the value is missing or not numeric
 */
export function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parses a frame rate, returning null for anything that is not a positive number
 */
export function parseFps(value: string | undefined): number | null {
  const parsed = parseNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

/**
 * Formats a scaled value using the shortest representation that round-trips
 */
export function formatAssNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}
