import { EpisodeKey, EpisodePattern, IgnorePattern } from './types';

export const SUBTITLE_EXTENSIONS = ['.ass', '.srt', '.ssa', '.sub'];

function toNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? null : parsed;
}

function seasonAndEpisode(match: RegExpMatchArray): EpisodeKey | null {
  const season = toNumber(match[1]);
  const episode = toNumber(match[2]);
  if (season === null || episode === null) return null;
  return { season, episode };
}

function episodeOnly(match: RegExpMatchArray): EpisodeKey | null {
  const episode = toNumber(match[1]);
  if (episode === null) return null;
  return { season: null, episode };
}

/**
 * Technical tags whose digits must never be read as an episode number.
 * Every occurrence of every pattern contributes an ignore range.
 */
export const IGNORE_PATTERNS: readonly IgnorePattern[] = [
  { label: 'dimensions', pattern: /\[[^\]]*\d+x\d+[^\]]*\]/g },
  { label: 'resolution', pattern: /\[[^\]]*\d+p[^\]]*\]/g },
  { label: 'source', pattern: /\[[^\]]*(?:DVDRip|BDRip|WebRip)[^\]]*\]/gi },
  { label: 'codec', pattern: /\[[^\]]*(?:x26[45]|hevc|avc|flac|ac3|mp3)[^\]]*\]/gi },
];

/**
 * Episode patterns in priority order. The first pattern with an occurrence
 * outside the ignore ranges wins, regardless of how specific later ones are.
 */
export const EPISODE_PATTERNS: readonly EpisodePattern[] = [
  { kind: 'season_episode', pattern: /S(\d+)E(\d+)/gi, extract: seasonAndEpisode },
  { kind: 'cross', pattern: /(\d+)x(\d+)/gi, extract: seasonAndEpisode },
  {
    kind: 'bracketed',
    pattern: /\[(\d{1,3})(?!\d)(?!p)(?!x\d)(?!bit)(?!-bit)\]/g,
    extract: episodeOnly,
  },
  { kind: 'bare', pattern: /(?<![0-9])E?(\d{1,3})(?![0-9xp])/gi, extract: episodeOnly },
];

/**
 * Captures the title before the first separator: " - ", SxxExx, AxB, Exx,
 * a bracketed episode number or a bracketed year.
 */
export const SHOW_NAME_PATTERN =
  /(?:\[[^\]]*\]\s*)*(.+?)(?:\s+-\s+|[\s._]+S\d+E\d+|[\s._]+\d+x\d+|[\s._]+E\d+|\s+\[\d{1,3}\]|\s+\[\d{4}\])/i;

export const BRACKETED_NUMBER_PATTERN = /\[\d{1,3}\]/g;

export const TECHNICAL_TAG_PATTERN =
  /\[[^\]]*(?:\d+-?bit|\d+p|\d+x\d+|HEVC|h26[45]|x26[45]|flac|aac)[^\]]*\]/gi;

export const LANGUAGE_CODE_PATTERN = /\.(?<lang>[a-z]{2,3})\.[^.]+$/;
