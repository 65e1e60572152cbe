/**
 * How a video/subtitle pair was matched
 */
export type MatchKind =
  | 'exact'
  | 'exact_with_lang_code'
  | 'episode'
  | 'fuzzy'
  | 'manual'
  | 'none';

/**
 * Score for a single video/subtitle pair
 */
export interface MatchCandidate {
  /** Score in [0, 1] */
  score: number;
  kind: Exclude<MatchKind, 'manual'>;
  reason: string;
}

/**
 * Best subtitle for one video
 */
export interface MatchResult {
  videoPath: string;
  /** Null when nothing matched or a strict policy rejected the best pair */
  subtitlePath: string | null;
  /** Confidence in [0, 1] */
  confidence: number;
  kind: MatchKind;
  /** Human-readable explanation, never empty */
  reason: string;
}

/**
 * A scored candidate, used when offering alternatives for manual selection
 */
export interface RankedSubtitle {
  subtitlePath: string;
  score: number;
  kind: MatchCandidate['kind'];
  reason: string;
}

/**
 * Counts shown after a batch has been matched
 */
export interface MatchSummary {
  total: number;
  highConfidence: number;
  lowConfidence: number;
  noMatch: number;
}
