import path from 'path';
import {
  BRACKETED_NUMBER_PATTERN,
  EPISODE_PATTERNS,
  IGNORE_PATTERNS,
  LANGUAGE_CODE_PATTERN,
  SHOW_NAME_PATTERN,
  TECHNICAL_TAG_PATTERN,
} from './patterns';
import { EpisodeKey, EpisodeMatch, EpisodePattern, IgnorePattern, ParsedName } from './types';

type Range = readonly [start: number, end: number];

const NO_EPISODE: EpisodeKey = { season: null, episode: null };

/**
 * Collects the spans covered by technical metadata tags
 */
export function findIgnoreRanges(
  filename: string,
  ignorePatterns: readonly IgnorePattern[] = IGNORE_PATTERNS
): Range[] {
  const ranges: Range[] = [];

  for (const { pattern } of ignorePatterns) {
    for (const match of filename.matchAll(pattern)) {
      const start = match.index ?? 0;
      ranges.push([start, start + match[0].length]);
    }
  }

  return ranges;
}

function isIgnored(offset: number, ranges: Range[]): boolean {
  return ranges.some(([start, end]) => start <= offset && offset <= end);
}

/**
 * Walks the episode pattern table in order and returns the first hit that
 * does not start inside an ignore range
 * @param filename - Filename (or stem) to inspect
 * @param patterns - Ordered episode pattern table
 * @param ignorePatterns - Technical metadata patterns
 * @returns The winning match, or null when nothing usable was found
 */
export function findEpisodeMatch(
  filename: string,
  patterns: readonly EpisodePattern[] = EPISODE_PATTERNS,
  ignorePatterns: readonly IgnorePattern[] = IGNORE_PATTERNS
): EpisodeMatch | null {
  const ranges = findIgnoreRanges(filename, ignorePatterns);

  for (const { kind, pattern, extract } of patterns) {
    for (const match of filename.matchAll(pattern)) {
      const index = match.index ?? 0;
      if (isIgnored(index, ranges)) continue;

      const key = extract(match);
      if (!key) continue;

      return { kind, key, index, length: match[0].length };
    }
  }

  return null;
}

/**
 * Extracts season and episode numbers from a release name.
 * Either field may be null; this never throws.
 */
export function extractEpisodeInfo(
  filename: string,
  patterns: readonly EpisodePattern[] = EPISODE_PATTERNS,
  ignorePatterns: readonly IgnorePattern[] = IGNORE_PATTERNS
): EpisodeKey {
  const match = findEpisodeMatch(filename, patterns, ignorePatterns);
  return match ? { ...match.key } : { ...NO_EPISODE };
}

function stripLeadingGroup(text: string): string {
  const groupMatch = text.match(/^\s*\[.*?\]\s*(.*?)$/);
  if (groupMatch) {
    return (groupMatch[1] ?? '').trim();
  }
  return text.trim();
}

/**
 * Extracts the show name from a release name.
 * Falls back to the trimmed input with bracketed tags removed.
 */
export function extractShowName(filename: string): string {
  const episodeMatch = findEpisodeMatch(filename);

  // "[Group] Show [05] [1080p]" style: the title sits before the episode bracket
  if (episodeMatch?.kind === 'bracketed') {
    const showName = stripLeadingGroup(filename.slice(0, episodeMatch.index));
    if (showName) return showName;
  }

  const titleMatch = filename.match(SHOW_NAME_PATTERN);
  const title = titleMatch?.[1]?.trim();
  if (title) {
    return title;
  }

  let cleanName = filename.replace(BRACKETED_NUMBER_PATTERN, '');
  cleanName = cleanName.replace(TECHNICAL_TAG_PATTERN, '');

  if (cleanName.startsWith('[')) {
    const rbracket = cleanName.indexOf(']');
    if (rbracket > 0) {
      cleanName = cleanName.slice(rbracket + 1);
    }
  }

  return cleanName.trim() || filename.trim();
}

/**
 * Returns the release group from a leading [Group] or (Group) tag
 */
export function extractReleaseGroup(filename: string): string | null {
  const bracketMatch = filename.match(/^\s*\[([^\]]+)\]/);
  if (bracketMatch?.[1]) {
    return bracketMatch[1].trim();
  }

  const parenMatch = filename.match(/^\s*\(([^)]+)\)/);
  if (parenMatch?.[1]) {
    return parenMatch[1].trim();
  }

  return null;
}

export function parseName(filename: string): ParsedName {
  return {
    showName: extractShowName(filename),
    episodeKey: extractEpisodeInfo(filename),
  };
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats an episode key as S01E05, or just 05 when the season is unknown
 * @returns The formatted number, or null when there is no episode
 */
export function formatEpisodeNumber(key: EpisodeKey): string | null {
  if (key.episode === null) return null;
  if (key.season !== null) {
    return `S${pad2(key.season)}E${pad2(key.episode)}`;
  }
  return pad2(key.episode);
}

/**
 * Reads a language code such as "eng" from "Show - 01.eng.ass"
 */
export function extractLangFromFilename(filePath: string | null): string | null {
  if (!filePath) return null;
  const match = path.basename(filePath).match(LANGUAGE_CODE_PATTERN);
  return match?.groups?.lang ?? null;
}

/**
 * Builds the muxed output name, e.g. "[MySubs] Show - S01E05 [1080p 10bit].mkv"
 * @param videoPath - Source video path
 * @param releaseTag - Tag placed in the leading brackets
 * @param videoParams - Technical parameters reported by the prober
 */
export function generateOutputFilename(
  videoPath: string,
  releaseTag: string,
  videoParams: string[] = []
): string {
  const ext = path.extname(videoPath);
  const stem = path.basename(videoPath, ext);

  const showName = extractShowName(stem);
  const episodeNumber = formatEpisodeNumber(extractEpisodeInfo(stem));
  const episodeStr = episodeNumber ? ` - ${episodeNumber}` : '';
  const paramsStr = videoParams.length > 0 ? ` [${videoParams.join(' ')}]` : '';

  return `[${releaseTag}] ${showName}${episodeStr}${paramsStr}${ext}`;
}
