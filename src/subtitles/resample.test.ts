import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { getField, parseAssDocument, serializeAssDocument } from './assDocument';
import { SubtitleFormatError } from './errors';
import {
  planResample,
  resampleSubtitle,
  resolveSourceResolution,
  scaleOverrideTags,
} from './resample';
import { TempWorkspace } from './tempWorkspace';

function buildScript(text: string, info: string[] = ['PlayResX: 640', 'PlayResY: 360']): string {
  return [
    '[Script Info]',
    'Title: Test',
    ...info,
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    'Style: Default,Arial,20,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,2,1,2,10,10,15,1',
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
    `Dialogue: 0,0:00:01.00,0:00:04.00,Default,,0,0,0,,${text}`,
    'Comment: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,note',
    '',
  ].join('\n');
}

describe('resolveSourceResolution', () => {
  it('should default each missing or zero axis independently', () => {
    expect(resolveSourceResolution({})).toEqual({ width: 1280, height: 720 });
    expect(resolveSourceResolution({ playResX: 0, playResY: 480 })).toEqual({ width: 1280, height: 480 });
    expect(resolveSourceResolution({ playResX: 1920, playResY: 1080 })).toEqual({ width: 1920, height: 1080 });
  });
});

describe('scaleOverrideTags', () => {
  it('should scale position and font size tags', () => {
    expect(scaleOverrideTags('{\\pos(320,180)\\fs20}Hi', { x: 2, y: 2 })).toBe('{\\pos(640,360)\\fs40}Hi');
  });

  it('should scale each axis by its own factor', () => {
    expect(
      scaleOverrideTags('{\\move(10,20,30,40,100,200)\\clip(0,0,320,180)\\fs20}Hi', { x: 3, y: 2 })
    ).toBe('{\\move(30,40,90,80,100,200)\\clip(0,0,960,360)\\fs40}Hi');
  });

  it('should scale org and iclip tags', () => {
    expect(scaleOverrideTags('{\\org(100,50)\\iclip(10,10,20,20)}', { x: 1.5, y: 2 })).toBe(
      '{\\org(150,100)\\iclip(15,20,30,40)}'
    );
  });

  it('should keep fractional results', () => {
    expect(scaleOverrideTags('{\\pos(333,100)}', { x: 1.5, y: 1.5 })).toBe('{\\pos(499.5,150)}');
  });

  it('should leave vector clips and plain text untouched', () => {
    const text = '{\\clip(m 0 0 l 100 0 100 100)}\\pos(1,1) outside';
    expect(scaleOverrideTags(text, { x: 2, y: 2 })).toBe(text);
  });

  it('should not treat other fs tags as font size', () => {
    expect(scaleOverrideTags('{\\fscx120\\fsp2}', { x: 2, y: 2 })).toBe('{\\fscx120\\fsp2}');
  });
});

describe('planResample', () => {
  it('should rewrite PlayRes, style geometry and override tags', () => {
    const doc = parseAssDocument(buildScript('{\\pos(320,180)}Hello, world'));
    const output = serializeAssDocument(
      doc,
      planResample(doc, {
        sourceRes: { width: 640, height: 360 },
        targetRes: { width: 1280, height: 720 },
        force: false,
        disabled: false,
      })
    );

    expect(output).toContain('\nPlayResX: 1280\nPlayResY: 720\n');
    expect(output).toContain(
      'Style: Default,Arial,40,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,0,0,0,0,100,100,0,0,1,4,2,2,20,20,30,1\n'
    );
    expect(output).toContain('Dialogue: 0,0:00:01.00,0:00:04.00,Default,,0,0,0,,{\\pos(640,360)}Hello, world\n');
    expect(output).toContain('Comment: 0,0:00:05.00,0:00:06.00,Default,,0,0,0,,note\n');
  });

  it('should insert PlayRes lines after the Script Info header when absent', () => {
    const doc = parseAssDocument(buildScript('Hi', []));
    const output = serializeAssDocument(
      doc,
      planResample(doc, {
        sourceRes: resolveSourceResolution(doc.scriptInfo),
        targetRes: { width: 1920, height: 1080 },
        force: false,
        disabled: false,
      })
    );

    expect(output.startsWith('[Script Info]\nPlayResX: 1920\nPlayResY: 1080\nTitle: Test\n')).toBe(true);
  });

  it('should throw when PlayRes is missing and there is no Script Info section', () => {
    const doc = parseAssDocument('[Events]\nFormat: Layer, Start, End, Text\nDialogue: 0,0:00:01.00,0:00:02.00,Hi\n');
    expect(() =>
      planResample(doc, {
        sourceRes: { width: 1280, height: 720 },
        targetRes: { width: 1920, height: 1080 },
        force: false,
        disabled: false,
      })
    ).toThrow(SubtitleFormatError);
  });
});

describe('resampleSubtitle', () => {
  let sourceDir: string;
  let outputDir: string;
  let workspace: TempWorkspace;

  beforeEach(() => {
    sourceDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resample-src-'));
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resample-out-'));
    workspace = new TempWorkspace(outputDir);
  });

  afterEach(() => {
    fs.rmSync(sourceDir, { recursive: true, force: true });
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function writeSource(name: string, content: string): string {
    const filePath = path.join(sourceDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('should skip when the resolutions already match', () => {
    const input = writeSource('ep01.ass', buildScript('Hi'));

    expect(resampleSubtitle(input, { width: 640, height: 360 }, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should write an identical copy when forced at the same resolution', () => {
    const content = buildScript('{\\pos(320,180)}Hi');
    const input = writeSource('ep01.ass', content);

    const output = resampleSubtitle(input, { width: 640, height: 360 }, { force: true, workspace });

    expect(output).not.toBe(input);
    expect(path.basename(output)).toMatch(/^ep01_resampled_[0-9a-f]{8}\.ass$/);
    expect(fs.readFileSync(output, 'utf-8')).toBe(content);
  });

  it('should do nothing when disabled or for non-ASS files', () => {
    const ass = writeSource('ep01.ass', buildScript('Hi'));
    const srt = writeSource('ep01.srt', '1\n00:00:01,000 --> 00:00:02,000\nHi\n');

    expect(resampleSubtitle(ass, { width: 1920, height: 1080 }, { disabled: true, workspace })).toBe(ass);
    expect(resampleSubtitle(srt, { width: 1920, height: 1080 }, { workspace })).toBe(srt);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should skip an invalid target resolution', () => {
    const input = writeSource('ep01.ass', buildScript('Hi'));
    expect(resampleSubtitle(input, { width: 0, height: 720 }, { workspace })).toBe(input);
  });

  it('should come back to the original geometry after a round trip', () => {
    const input = writeSource('ep01.ass', buildScript('{\\pos(320,180)\\fs20}Hi'));

    const upscaled = resampleSubtitle(input, { width: 1920, height: 1080 }, { workspace });
    const restored = resampleSubtitle(upscaled, { width: 640, height: 360 }, { workspace });
    const doc = parseAssDocument(fs.readFileSync(restored, 'utf-8'));
    const style = doc.styles[0];
    const dialogue = doc.events[0];
    if (!style || !dialogue) throw new Error('document not parsed');

    expect(doc.scriptInfo).toEqual({ playResX: 640, playResY: 360 });
    expect(Number(getField(style, 'fontsize'))).toBeCloseTo(20);
    expect(Number(getField(style, 'outline'))).toBeCloseTo(2);
    expect(getField(style, 'marginv')).toBe('15');

    const pos = getField(dialogue, 'text').match(/\\pos\(([^,]+),([^)]+)\)/);
    expect(Number(pos?.[1])).toBeCloseTo(320);
    expect(Number(pos?.[2])).toBeCloseTo(180);
  });

  it('should return the input and leave no output for a malformed script', () => {
    const input = writeSource('broken.ass', '[Events]\nFormat: Layer, Start, End, Text\nDialogue: 0,0:00:01.00,0:00:02.00,Hi\n');

    expect(resampleSubtitle(input, { width: 1920, height: 1080 }, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should return the input when a style value is not numeric', () => {
    const input = writeSource('broken.ass', buildScript('Hi').replace('Arial,20,', 'Arial,big,'));

    expect(resampleSubtitle(input, { width: 1920, height: 1080 }, { workspace })).toBe(input);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });
});
