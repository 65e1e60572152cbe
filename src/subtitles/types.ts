/**
 * Subtitle families the transforms know how to rewrite
 */
export type SubtitleFormat = 'ass' | 'srt' | 'unsupported';

export interface Resolution {
  width: number;
  height: number;
}

/**
 * Optional script-level fields read from [Script Info].
 * Absent or unparsable values stay undefined; consumers apply the defaults
 * (1280x720 for PlayRes, 23.976 fps for Timer).
 */
export interface ScriptInfo {
  playResX?: number;
  playResY?: number;
  /** Raw Timer value, interpreted as a frame rate */
  timer?: string;
}

/**
 * One physical line of a subtitle file, without its line ending
 */
export interface DocumentLine {
  text: string;
  /** "\n", "\r\n", or for the final line "\r" or "" */
  eol: string;
}

/**
 * A "Key: a,b,c" record split according to its section's Format line
 */
export interface FieldRecord {
  lineIndex: number;
  /** Everything up to the first value, e.g. "Style: " */
  prefix: string;
  values: string[];
  /** Lowercased Format field names, parallel to values */
  fieldNames: readonly string[];
}

export interface AssStyle extends FieldRecord {
  name: string;
}

export interface AssEvent extends FieldRecord {
  /** Dialogue, Comment, ... */
  type: string;
}

/**
 * Parsed ASS/SSA script. Treated as an immutable value: transforms describe
 * their edits as patches and serialize once.
 */
export interface AssDocument {
  bom: boolean;
  lines: readonly DocumentLine[];
  scriptInfo: ScriptInfo;
  /** Index of the [Script Info] header line, if present */
  scriptInfoHeader: number | null;
  /** Indexes of the PlayResX / PlayResY lines, if present */
  playResLines: { x?: number; y?: number };
  styles: readonly AssStyle[];
  events: readonly AssEvent[];
}

/**
 * An edit to a document line: replace it, or insert a new line after it
 */
export type LinePatch =
  | { type: 'replace'; lineIndex: number; text: string }
  | { type: 'insertAfter'; lineIndex: number; text: string };

export interface TimeShiftRequest {
  /** Signed frame offset */
  frames: number;
  fps: number;
}

export interface ResampleRequest {
  sourceRes: Resolution;
  targetRes: Resolution;
  force: boolean;
  disabled: boolean;
}
