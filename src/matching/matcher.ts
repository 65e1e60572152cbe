import fs from 'fs';
import path from 'path';
import { parseName, SUBTITLE_EXTENSIONS, ParsedName } from '../filenames';
import { similarity } from './similarity';
import { MatchCandidate, MatchResult, MatchSummary, RankedSubtitle } from './types';

/** Best score a strict match has to reach */
export const STRICT_THRESHOLD = 0.9;

/** Default threshold used by callers when deciding whether to trust a match */
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

const MAX_EPISODE_SCORE = 0.95;

function fileStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

interface ParsedFile {
  stem: string;
  parsed: ParsedName;
}

function parseFile(filePath: string): ParsedFile {
  const stem = fileStem(filePath);
  return { stem, parsed: parseName(stem) };
}

/**
 * Scores a single video/subtitle pair from already parsed names
 */
function scoreParsed(video: ParsedFile, sub: ParsedFile): MatchCandidate {
  // 1. Exact filename match (excluding extension)
  if (video.stem === sub.stem) {
    return { score: 1.0, kind: 'exact', reason: 'Exact filename match' };
  }

  // 2. Same base with a language code, e.g. "Show - 01.eng.ass"
  if (sub.stem.startsWith(`${video.stem}.`)) {
    return { score: 0.99, kind: 'exact_with_lang_code', reason: 'Exact match with language code' };
  }

  const { season: videoSeason, episode: videoEpisode } = video.parsed.episodeKey;
  const { season: subSeason, episode: subEpisode } = sub.parsed.episodeKey;
  const videoShow = video.parsed.showName;
  const subShow = sub.parsed.showName;

  // 3. Episode number matching
  if (videoEpisode !== null && subEpisode !== null && videoEpisode === subEpisode) {
    let score = 0.6;
    let reason = `Episode E${pad2(videoEpisode)} match (no season info)`;

    if (videoSeason !== null && subSeason !== null) {
      if (videoSeason !== subSeason) {
        // Different seasons: no show name bonus
        return {
          score: 0.2,
          kind: 'episode',
          reason: `Episode match but different season (S${videoSeason} vs S${subSeason})`,
        };
      }
      score = 0.8;
      reason = `Episode S${pad2(videoSeason)}E${pad2(videoEpisode)} match`;
    }

    const showSimilarity = similarity(videoShow, subShow);
    if (showSimilarity > 0.8) {
      score += 0.15;
      reason += ' with similar show name';
    } else if (showSimilarity > 0.5) {
      score += 0.05;
    }

    return { score: Math.min(score, MAX_EPISODE_SCORE), kind: 'episode', reason };
  }

  // 4. Fuzzy show name matching, only when the video carries no episode number
  if (videoEpisode === null && videoShow && subShow) {
    const showSimilarity = similarity(videoShow, subShow);
    const percent = Math.round(showSimilarity * 100);

    if (showSimilarity > 0.9) {
      return { score: 0.7, kind: 'fuzzy', reason: `High show name similarity (${percent}%)` };
    }
    if (showSimilarity > 0.7) {
      return { score: 0.5, kind: 'fuzzy', reason: `Moderate show name similarity (${percent}%)` };
    }
  }

  return { score: 0.0, kind: 'none', reason: 'No matching criteria' };
}

export interface MatcherOptions {
  /** Logs every scored pair */
  debug?: boolean;
}

/**
 * Ranks subtitle candidates against video files.
 * Holds no state between calls, so one instance can serve concurrent batches.
 */
export class SubtitleMatcher {
  private debug: boolean;

  constructor(options: MatcherOptions = {}) {
    this.debug = options.debug ?? false;
  }

  /**
   * Scores one video/subtitle pair
   * @param videoPath - Path to the video file
   * @param subtitlePath - Path to the candidate subtitle
   */
  scoreMatch(videoPath: string, subtitlePath: string): MatchCandidate {
    return scoreParsed(parseFile(videoPath), parseFile(subtitlePath));
  }

  /**
   * Finds the best subtitle for a single video.
   * Ties keep the first candidate seen.
   * @param videoPath - Path to the video file
   * @param candidates - Subtitle paths to consider
   * @param strict - Reject anything below the strict threshold
   */
  matchSingle(videoPath: string, candidates: string[], strict: boolean = false): MatchResult {
    if (candidates.length === 0) {
      return {
        videoPath,
        subtitlePath: null,
        confidence: 0.0,
        kind: 'none',
        reason: 'No subtitle files found',
      };
    }

    const video = parseFile(videoPath);

    if (this.debug) {
      const { season, episode } = video.parsed.episodeKey;
      console.debug(`Matching ${path.basename(videoPath)}: show '${video.parsed.showName}' S${season}E${episode}`);
    }

    let bestPath: string | null = null;
    let best: MatchCandidate = { score: 0.0, kind: 'none', reason: 'No matching criteria' };

    for (const subtitlePath of candidates) {
      const candidate = scoreParsed(video, parseFile(subtitlePath));

      if (this.debug) {
        console.debug(
          `  ${path.basename(subtitlePath)}: ${candidate.score.toFixed(2)} (${candidate.kind}) - ${candidate.reason}`
        );
      }

      if (candidate.score > best.score) {
        best = candidate;
        bestPath = subtitlePath;
      }
    }

    if (strict && best.score < STRICT_THRESHOLD) {
      return {
        videoPath,
        subtitlePath: null,
        confidence: best.score,
        kind: 'none',
        reason: `Best match below strict threshold: ${best.reason}`,
      };
    }

    return {
      videoPath,
      subtitlePath: bestPath,
      confidence: best.score,
      kind: bestPath ? best.kind : 'none',
      reason: best.reason,
    };
  }

  /**
   * Matches every video against the same full subtitle list.
   * The same subtitle may win for several videos.
   */
  matchBatch(videoPaths: string[], subtitlePaths: string[], strict: boolean = false): MatchResult[] {
    return videoPaths.map((videoPath) => this.matchSingle(videoPath, subtitlePaths, strict));
  }

  /**
   * Ranks every candidate for manual selection
   * @param videoPath - Path to the video file
   * @param candidates - Subtitle paths to consider
   * @param limit - Maximum number of entries returned
   * @returns Candidates sorted by score, best first
   */
  getAlternativeMatches(videoPath: string, candidates: string[], limit: number = 5): RankedSubtitle[] {
    const video = parseFile(videoPath);

    return candidates
      .map((subtitlePath) => ({ subtitlePath, ...scoreParsed(video, parseFile(subtitlePath)) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit));
  }
}

/**
 * Whether a result can be used without review
 */
export function isConfident(
  result: MatchResult,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): boolean {
  return result.confidence >= threshold;
}

/**
 * Replaces an automatic result with a user's choice
 * @param subtitlePath - Chosen subtitle, or null to leave the video unpaired
 */
export function createManualMatch(videoPath: string, subtitlePath: string | null): MatchResult {
  return {
    videoPath,
    subtitlePath,
    confidence: subtitlePath ? 1.0 : 0.0,
    kind: 'manual',
    reason: subtitlePath ? 'Manually selected' : 'Manually cleared',
  };
}

export function summarizeMatches(
  results: MatchResult[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): MatchSummary {
  const matched = results.filter((result) => result.subtitlePath !== null);
  const highConfidence = matched.filter((result) => isConfident(result, threshold)).length;

  return {
    total: results.length,
    highConfidence,
    lowConfidence: matched.length - highConfidence,
    noMatch: results.length - matched.length,
  };
}

/**
 * Recursively collects subtitle files below a directory
 * @returns Paths joined onto root, sorted
 */
export function findSubtitleFiles(root: string): string[] {
  const found: string[] = [];

  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(entryPath);
      } else if (SUBTITLE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
        found.push(entryPath);
      }
    }
  };

  walk(root);
  return found.sort();
}

export const subtitleMatcher = new SubtitleMatcher();
