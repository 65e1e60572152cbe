import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { computeShiftMs, shiftAssContent, shiftSubtitleTiming } from './timingShift';
import { TempWorkspace } from './tempWorkspace';

const ASS = [
  '[Script Info]',
  'PlayResX: 1280',
  'PlayResY: 720',
  '',
  '[Events]',
  'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
  'Dialogue: 0,0:00:01.00,0:00:04.00,Default,,0,0,0,,Hello, world',
  'Comment: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,note',
  '',
].join('\n');

describe('computeShiftMs', () => {
  it('should round frames to whole milliseconds', () => {
    expect(computeShiftMs({ frames: 24, fps: 23.976 })).toBe(1001);
    expect(computeShiftMs({ frames: -48, fps: 23.976 })).toBe(-2002);
    expect(computeShiftMs({ frames: 25, fps: 25 })).toBe(1000);
  });
});

describe('shiftAssContent', () => {
  it('should shift every event', () => {
    const result = shiftAssContent(ASS, 24);

    expect(result.shiftMs).toBe(1001);
    expect(result.events).toBe(2);
    expect(result.content).toContain('Dialogue: 0,0:00:02.00,0:00:05.00,Default,,0,0,0,,Hello, world\n');
    expect(result.content).toContain('Comment: 0,0:00:06.00,0:00:07.00,Default,,0,0,0,,note\n');
    expect(result.content.startsWith('[Script Info]\nPlayResX: 1280\nPlayResY: 720\n')).toBe(true);
  });

  it('should clamp negative times to zero', () => {
    const result = shiftAssContent(ASS, -48);
    expect(result.content).toContain('Dialogue: 0,0:00:00.00,0:00:01.99,Default');
  });

  it('should prefer the script Timer over the default frame rate', () => {
    const withTimer = ASS.replace('PlayResX: 1280', 'Timer: 25');
    const result = shiftAssContent(withTimer, 25);

    expect(result.request.fps).toBe(25);
    expect(result.shiftMs).toBe(1000);
  });

  it('should ignore an unusable Timer', () => {
    const withTimer = ASS.replace('PlayResX: 1280', 'Timer: fast');
    expect(shiftAssContent(withTimer, 24).request.fps).toBe(23.976);
  });
});

describe('shiftSubtitleTiming', () => {
  let sourceDir: string;
  let outputDir: string;
  let workspace: TempWorkspace;

  beforeEach(() => {
    sourceDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shift-src-'));
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shift-out-'));
    workspace = new TempWorkspace(outputDir);
  });

  afterEach(() => {
    fs.rmSync(sourceDir, { recursive: true, force: true });
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('should return the input untouched for a zero shift', () => {
    const input = path.join(sourceDir, 'ep01.ass');
    fs.writeFileSync(input, ASS);

    expect(shiftSubtitleTiming(input, 0, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should write a shifted copy into the workspace', () => {
    const input = path.join(sourceDir, 'ep01.ass');
    fs.writeFileSync(input, ASS);

    const output = shiftSubtitleTiming(input, 24, { workspace });

    expect(path.dirname(output)).toBe(outputDir);
    expect(path.basename(output)).toMatch(/^ep01_shifted_[0-9a-f]{8}\.ass$/);
    expect(fs.readFileSync(output, 'utf-8')).toContain('Dialogue: 0,0:00:02.00,0:00:05.00,');
    expect(fs.readFileSync(input, 'utf-8')).toBe(ASS);
  });

  it('should shift SRT files at 23.976 fps', () => {
    const input = path.join(sourceDir, 'ep01.srt');
    fs.writeFileSync(input, '1\n00:00:01,000 --> 00:00:02,000\nHello\n');

    const output = shiftSubtitleTiming(input, 24, { workspace });

    expect(fs.readFileSync(output, 'utf-8')).toBe('1\n00:00:02,001 --> 00:00:03,001\nHello\n');
  });

  it('should pass unsupported formats through', () => {
    const input = path.join(sourceDir, 'ep01.sub');
    fs.writeFileSync(input, '{0}{25}Hello');

    expect(shiftSubtitleTiming(input, 24, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should return the input when the file cannot be read', () => {
    const input = path.join(sourceDir, 'missing.ass');
    expect(shiftSubtitleTiming(input, 24, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should return the input and leave no output for malformed timestamps', () => {
    const input = path.join(sourceDir, 'broken.ass');
    fs.writeFileSync(input, ASS.replace('0:00:01.00', 'soon'));

    expect(shiftSubtitleTiming(input, 24, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });
});
