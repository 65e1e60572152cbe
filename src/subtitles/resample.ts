import fs from 'fs';
import path from 'path';
import {
  getField,
  hasField,
  parseAssDocument,
  renderRecord,
  serializeAssDocument,
} from './assDocument';
import { SubtitleFormatError } from './errors';
import { detectSubtitleFormat, formatAssNumber, parseNumber } from './format';
import { TempWorkspace, tempWorkspace } from './tempWorkspace';
import { AssDocument, LinePatch, ResampleRequest, Resolution, ScriptInfo } from './types';

/** Script resolution assumed when PlayResX/PlayResY is zero or missing */
export const DEFAULT_PLAY_RES: Resolution = { width: 1280, height: 720 };

export interface ResampleOptions {
  /** Rewrite even when the resolutions already match */
  force?: boolean;
  /** Skip resampling entirely */
  disabled?: boolean;
  workspace?: TempWorkspace;
}

interface ScaleFactors {
  x: number;
  y: number;
}

interface StyleFieldRule {
  field: string;
  axis: keyof ScaleFactors;
  integer: boolean;
}

const STYLE_FIELD_RULES: readonly StyleFieldRule[] = [
  { field: 'fontsize', axis: 'y', integer: false },
  { field: 'outline', axis: 'y', integer: false },
  { field: 'shadow', axis: 'y', integer: false },
  { field: 'spacing', axis: 'x', integer: false },
  { field: 'marginl', axis: 'x', integer: true },
  { field: 'marginr', axis: 'x', integer: true },
  { field: 'marginv', axis: 'y', integer: true },
];

const NUM = String.raw`\s*(-?(?:\d+(?:\.\d*)?|\.\d+))\s*`;

const OVERRIDE_BLOCK = /\{[^}]*\}/g;
const POS_TAG = new RegExp(String.raw`\\pos\(${NUM},${NUM}\)`, 'g');
const ORG_TAG = new RegExp(String.raw`\\org\(${NUM},${NUM}\)`, 'g');
const MOVE_TAG = new RegExp(
  String.raw`\\move\(${NUM},${NUM},${NUM},${NUM}((?:,\s*-?\d+(?:\.\d*)?\s*){2})?\)`,
  'g'
);
const RECT_CLIP_TAG = new RegExp(String.raw`\\(i?clip)\(${NUM},${NUM},${NUM},${NUM}\)`, 'g');
const FONT_SIZE_TAG = /\\fs(\d+(?:\.\d+)?)/g;

export function resolveSourceResolution(info: ScriptInfo): Resolution {
  return {
    width: info.playResX && info.playResX > 0 ? info.playResX : DEFAULT_PLAY_RES.width,
    height: info.playResY && info.playResY > 0 ? info.playResY : DEFAULT_PLAY_RES.height,
  };
}

function scaleValue(value: string, factor: number): string {
  return formatAssNumber(Number(value) * factor);
}

/**
 * Scales the absolute coordinates of override tags inside {...} blocks.
 * Vector clips and every other tag are left untouched.
 */
export function scaleOverrideTags(text: string, scale: ScaleFactors): string {
  const { x, y } = scale;

  return text.replace(OVERRIDE_BLOCK, (block) =>
    block
      .replace(POS_TAG, (_m, px: string, py: string) => `\\pos(${scaleValue(px, x)},${scaleValue(py, y)})`)
      .replace(ORG_TAG, (_m, ox: string, oy: string) => `\\org(${scaleValue(ox, x)},${scaleValue(oy, y)})`)
      .replace(
        MOVE_TAG,
        (_m, x1: string, y1: string, x2: string, y2: string, times: string | undefined) =>
          `\\move(${scaleValue(x1, x)},${scaleValue(y1, y)},${scaleValue(x2, x)},${scaleValue(y2, y)}${times ?? ''})`
      )
      .replace(
        RECT_CLIP_TAG,
        (_m, tag: string, x1: string, y1: string, x2: string, y2: string) =>
          `\\${tag}(${scaleValue(x1, x)},${scaleValue(y1, y)},${scaleValue(x2, x)},${scaleValue(y2, y)})`
      )
      .replace(FONT_SIZE_TAG, (_m, size: string) => `\\fs${scaleValue(size, y)}`)
  );
}

function replaceInfoValue(text: string, value: number): string {
  return text.replace(/^([^:]*:\s*).*$/, (_m, prefix: string) => `${prefix}${value}`);
}

/**
 * Describes the edits that move a script from its source to its target
 * resolution: PlayRes, style geometry and event override tags
 */
export function planResample(doc: AssDocument, request: ResampleRequest): LinePatch[] {
  const { sourceRes, targetRes } = request;
  const scale: ScaleFactors = {
    x: targetRes.width / sourceRes.width,
    y: targetRes.height / sourceRes.height,
  };
  const patches: LinePatch[] = [];

  const { x: playResXLine, y: playResYLine } = doc.playResLines;
  const missing: string[] = [];

  for (const [lineIndex, key, value] of [
    [playResXLine, 'PlayResX', targetRes.width],
    [playResYLine, 'PlayResY', targetRes.height],
  ] as const) {
    const line = lineIndex !== undefined ? doc.lines[lineIndex] : undefined;
    if (lineIndex !== undefined && line) {
      patches.push({ type: 'replace', lineIndex, text: replaceInfoValue(line.text, value) });
    } else {
      missing.push(`${key}: ${value}`);
    }
  }

  if (missing.length > 0) {
    if (doc.scriptInfoHeader === null) {
      throw new SubtitleFormatError('Missing [Script Info] section');
    }
    for (const text of missing) {
      patches.push({ type: 'insertAfter', lineIndex: doc.scriptInfoHeader, text });
    }
  }

  for (const style of doc.styles) {
    const updates: Record<string, string> = {};

    for (const rule of STYLE_FIELD_RULES) {
      if (!hasField(style, rule.field)) continue;

      const raw = getField(style, rule.field);
      const value = parseNumber(raw);
      if (value === null) {
        throw new SubtitleFormatError(`Invalid ${rule.field} "${raw}" in style ${style.name}`);
      }

      const scaled = rule.integer ? Math.round(value * scale[rule.axis]) : value * scale[rule.axis];
      if (scaled !== value) {
        updates[rule.field] = formatAssNumber(scaled);
      }
    }

    if (Object.keys(updates).length > 0) {
      patches.push({ type: 'replace', lineIndex: style.lineIndex, text: renderRecord(style, updates) });
    }
  }

  for (const event of doc.events) {
    if (!hasField(event, 'text')) continue;

    const text = getField(event, 'text');
    const scaled = scaleOverrideTags(text, scale);
    if (scaled !== text) {
      patches.push({ type: 'replace', lineIndex: event.lineIndex, text: renderRecord(event, { text: scaled }) });
    }
  }

  return patches;
}

function sameResolution(a: Resolution, b: Resolution): boolean {
  return a.width === b.width && a.height === b.height;
}

/**
 * Resamples an ASS/SSA subtitle to a target resolution
 * @param subtitlePath - Subtitle file; other formats are returned as is
 * @param targetRes - Resolution of the video the subtitle will be muxed with
 * @param options - force / disabled flags and output workspace
 * @returns Path of the resampled copy, or the input path when nothing was done
 *   or the file could not be resampled
 */
export function resampleSubtitle(
  subtitlePath: string,
  targetRes: Resolution,
  options: ResampleOptions = {}
): string {
  const force = options.force ?? false;
  const disabled = options.disabled ?? false;

  if (detectSubtitleFormat(subtitlePath) !== 'ass' || disabled) {
    return subtitlePath;
  }

  if (!(targetRes.width > 0 && targetRes.height > 0)) {
    console.warn(
      `Invalid target resolution ${targetRes.width}x${targetRes.height}, skipping subtitle resample`
    );
    return subtitlePath;
  }

  const workspace = options.workspace ?? tempWorkspace;
  let outputPath: string | null = null;

  try {
    const doc = parseAssDocument(fs.readFileSync(subtitlePath, 'utf-8'));
    const request: ResampleRequest = {
      sourceRes: resolveSourceResolution(doc.scriptInfo),
      targetRes,
      force,
      disabled,
    };
    const { sourceRes } = request;

    if (!request.force && sameResolution(sourceRes, targetRes)) {
      console.info(
        `Subtitle resolution (${sourceRes.width}x${sourceRes.height}) already matches video - skipping resample`
      );
      return subtitlePath;
    }

    const content = serializeAssDocument(doc, planResample(doc, request));

    outputPath = workspace.createFilePath(subtitlePath, 'resampled');
    workspace.writeFile(outputPath, content);

    console.info(
      `Resampled subtitle from ${sourceRes.width}x${sourceRes.height} to ${targetRes.width}x${targetRes.height}`
    );
    return outputPath;
  } catch (error) {
    console.error(
      `Error while resampling subtitle ${path.basename(subtitlePath)}:`,
      error instanceof Error ? error.message : error
    );
    if (outputPath) {
      workspace.discard(outputPath);
    }
    return subtitlePath;
  }
}
