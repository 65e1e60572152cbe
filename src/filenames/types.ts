/**
 * Season/episode numbers recovered from a release name.
 * `null` means the value could not be determined, never zero.
 */
export interface EpisodeKey {
  season: number | null;
  episode: number | null;
}

/**
 * Structured view of a single filename
 */
export interface ParsedName {
  showName: string;
  episodeKey: EpisodeKey;
}

/**
 * Which episode pattern produced a match
 */
export type EpisodePatternKind = 'season_episode' | 'cross' | 'bracketed' | 'bare';

/**
 * One row of the ordered episode pattern table
 */
export interface EpisodePattern {
  kind: EpisodePatternKind;
  /** Must carry the `g` flag so every occurrence can be inspected */
  pattern: RegExp;
  extract: (match: RegExpMatchArray) => EpisodeKey | null;
}

/**
 * Pattern for technical metadata that must never be read as an episode number
 */
export interface IgnorePattern {
  label: string;
  pattern: RegExp;
}

/**
 * An episode pattern hit that lies outside every ignore range
 */
export interface EpisodeMatch {
  kind: EpisodePatternKind;
  key: EpisodeKey;
  /** Offset of the match within the filename */
  index: number;
  length: number;
}
