import fs from 'fs';
import path from 'path';
import {
  assTimestampToMs,
  getField,
  msToAssTimestamp,
  parseAssDocument,
  renderRecord,
  serializeAssDocument,
} from './assDocument';
import { DEFAULT_FPS, detectSubtitleFormat, parseFps } from './format';
import { shiftSrtContent } from './srtParser';
import { TempWorkspace, tempWorkspace } from './tempWorkspace';
import { LinePatch, TimeShiftRequest } from './types';

export interface ShiftOptions {
  workspace?: TempWorkspace;
}

export interface ShiftedContent {
  content: string;
  request: TimeShiftRequest;
  shiftMs: number;
  /** Number of events or cues rewritten */
  events: number;
}

export function computeShiftMs(request: TimeShiftRequest): number {
  return Math.round((request.frames * 1000) / request.fps);
}

/**
 * Shifts every event of an ASS/SSA script. The frame rate comes from the
 * script's Timer field when it parses, otherwise 23.976.
 */
export function shiftAssContent(content: string, frames: number): ShiftedContent {
  const doc = parseAssDocument(content);
  const request: TimeShiftRequest = { frames, fps: parseFps(doc.scriptInfo.timer) ?? DEFAULT_FPS };
  const shiftMs = computeShiftMs(request);

  const patches = doc.events.map((event): LinePatch => {
    const start = Math.max(0, assTimestampToMs(getField(event, 'start')) + shiftMs);
    const end = Math.max(0, assTimestampToMs(getField(event, 'end')) + shiftMs);

    return {
      type: 'replace',
      lineIndex: event.lineIndex,
      text: renderRecord(event, { start: msToAssTimestamp(start), end: msToAssTimestamp(end) }),
    };
  });

  return { content: serializeAssDocument(doc, patches), request, shiftMs, events: patches.length };
}

/**
 * SRT carries no frame rate, so frames are always converted at 23.976
 */
function shiftSrt(content: string, frames: number): ShiftedContent {
  const request: TimeShiftRequest = { frames, fps: DEFAULT_FPS };
  const shiftMs = computeShiftMs(request);
  const shifted = shiftSrtContent(content, shiftMs);
  return { content: shifted.content, request, shiftMs, events: shifted.cues };
}

/**
 * Shifts subtitle timing by a number of frames
 * @param subtitlePath - ASS/SSA or SRT file
 * @param frames - Signed frame offset; 0 returns the input untouched
 * @param options - Output workspace
 * @returns Path of the shifted copy, or the input path when nothing was done
 *   or the file could not be shifted
 */
export function shiftSubtitleTiming(
  subtitlePath: string,
  frames: number,
  options: ShiftOptions = {}
): string {
  if (frames === 0) {
    return subtitlePath;
  }

  const format = detectSubtitleFormat(subtitlePath);
  if (format === 'unsupported') {
    console.warn(
      `Subtitle format ${path.extname(subtitlePath) || '(none)'} doesn't support shifting, using original`
    );
    return subtitlePath;
  }

  const workspace = options.workspace ?? tempWorkspace;
  let outputPath: string | null = null;

  try {
    const content = fs.readFileSync(subtitlePath, 'utf-8');
    const shifted =
      format === 'ass'
        ? shiftAssContent(content, frames)
        : shiftSrt(content, frames);

    outputPath = workspace.createFilePath(subtitlePath, 'shifted');
    workspace.writeFile(outputPath, shifted.content);

    console.info(
      `Shifted subtitle by ${frames} frames (${shifted.shiftMs}ms at ${shifted.request.fps.toFixed(3)}fps)`
    );
    return outputPath;
  } catch (error) {
    console.error(
      `Error shifting subtitle ${path.basename(subtitlePath)}:`,
      error instanceof Error ? error.message : error
    );
    if (outputPath) {
      workspace.discard(outputPath);
    }
    return subtitlePath;
  }
}
