import { describe, it, expect } from 'vitest';
import {
  extractEpisodeInfo,
  extractShowName,
  extractReleaseGroup,
  extractLangFromFilename,
  findEpisodeMatch,
  formatEpisodeNumber,
  generateOutputFilename,
  parseName,
} from './filenameParser';
import { EpisodePattern } from './types';

describe('extractEpisodeInfo', () => {
  it('should not mistake a resolution tag for an episode number', () => {
    expect(extractEpisodeInfo('ShowName - 07 [1080p].mkv')).toEqual({ season: null, episode: 7 });
  });

  it('should extract S01E01 pattern', () => {
    expect(extractEpisodeInfo('Show.S02E05.mkv')).toEqual({ season: 2, episode: 5 });
    expect(extractEpisodeInfo('show s1e12')).toEqual({ season: 1, episode: 12 });
  });

  it('should extract 1x05 pattern', () => {
    expect(extractEpisodeInfo('Show 1x05')).toEqual({ season: 1, episode: 5 });
  });

  it('should extract a bracketed episode number without a season', () => {
    expect(extractEpisodeInfo('[Group] Show [05] [1080p]')).toEqual({ season: null, episode: 5 });
  });

  it('should accept an E prefix on a bare number', () => {
    expect(extractEpisodeInfo('Show E12 [720p]')).toEqual({ season: null, episode: 12 });
  });

  it('should skip occurrences inside technical tags and keep looking', () => {
    expect(extractEpisodeInfo('[Grp] Show [960x720] 03')).toEqual({ season: null, episode: 3 });
  });

  it('should prefer the earlier pattern in the table over a later one', () => {
    // The bracketed [07] would match too, but SxxExx is checked first
    expect(extractEpisodeInfo('[07] Show S03E09')).toEqual({ season: 3, episode: 9 });
  });

  it('should return nulls for unrecognized names', () => {
    expect(extractEpisodeInfo('random_file')).toEqual({ season: null, episode: null });
    expect(extractEpisodeInfo('')).toEqual({ season: null, episode: null });
  });

  it('should honour a custom pattern table', () => {
    const onlyBracketed: EpisodePattern[] = [
      {
        kind: 'bracketed',
        pattern: /\[(\d{1,3})\]/g,
        extract: (match) => ({ season: null, episode: Number(match[1]) }),
      },
    ];
    expect(extractEpisodeInfo('Show S01E02', onlyBracketed)).toEqual({
      season: null,
      episode: null,
    });
  });
});

describe('findEpisodeMatch', () => {
  it('should report which pattern matched and where', () => {
    expect(findEpisodeMatch('[Group] Show [05]')).toEqual({
      kind: 'bracketed',
      key: { season: null, episode: 5 },
      index: 13,
      length: 4,
    });
  });
});

describe('extractShowName', () => {
  it('should handle many leading bracket groups quickly', () => {
    const name = '[a]'.repeat(30) + ' x';

    const started = performance.now();
    const showName = extractShowName(name);
    const elapsed = performance.now() - started;

    expect(showName).toBe('[a]'.repeat(29) + ' x');
    expect(elapsed).toBeLessThan(500);
  });

  it('should stop at the dash separator', () => {
    expect(extractShowName('ShowName - 07 [1080p].mkv')).toBe('ShowName');
  });

  it('should stop at a dotted SxxExx marker', () => {
    expect(extractShowName('The.Expanse.S01E05')).toBe('The.Expanse');
  });

  it('should skip a leading release group', () => {
    expect(extractShowName('[SubsPlease] Frieren - 03 (1080p)')).toBe('Frieren');
  });

  it('should take the text before a bracketed episode number', () => {
    expect(extractShowName('[Group] Show [05] [1080p]')).toBe('Show');
  });

  it('should strip technical tags when no separator is present', () => {
    expect(extractShowName('[Group] Show Title [1080p]')).toBe('Show Title');
  });

  it('should fall back to the trimmed input', () => {
    expect(extractShowName('S01E01')).toBe('S01E01');
    expect(extractShowName('[Group] [1080p]')).toBe('[Group] [1080p]');
  });
});

describe('extractReleaseGroup', () => {
  it('should read a leading bracket group', () => {
    expect(extractReleaseGroup('[SubsPlease] Show - 01')).toBe('SubsPlease');
  });

  it('should read a leading parenthesised group', () => {
    expect(extractReleaseGroup('(Group) Show - 01')).toBe('Group');
  });

  it('should return null without a leading group', () => {
    expect(extractReleaseGroup('Show - 01 [1080p]')).toBeNull();
  });
});

describe('parseName', () => {
  it('should combine show name and episode key', () => {
    expect(parseName('[Grp] Show - 05')).toEqual({
      showName: 'Show',
      episodeKey: { season: null, episode: 5 },
    });
  });
});

describe('formatEpisodeNumber', () => {
  it('should format with and without a season', () => {
    expect(formatEpisodeNumber({ season: 2, episode: 5 })).toBe('S02E05');
    expect(formatEpisodeNumber({ season: null, episode: 7 })).toBe('07');
    expect(formatEpisodeNumber({ season: 1, episode: null })).toBeNull();
  });
});

describe('extractLangFromFilename', () => {
  it('should read the language code before the extension', () => {
    expect(extractLangFromFilename('/subs/Show - 01.eng.ass')).toBe('eng');
  });

  it('should return null when there is no language code', () => {
    expect(extractLangFromFilename('/subs/Show - 01.ass')).toBeNull();
    expect(extractLangFromFilename(null)).toBeNull();
  });
});

describe('generateOutputFilename', () => {
  it('should build a tagged output name', () => {
    expect(
      generateOutputFilename('/videos/[Grp] Show - 05 [1080p].mkv', 'MySubs', ['1080p', '10bit'])
    ).toBe('[MySubs] Show - 05 [1080p 10bit].mkv');
  });

  it('should omit missing parts', () => {
    expect(generateOutputFilename('/videos/Movie.mkv', 'MySubs')).toBe('[MySubs] Movie.mkv');
  });
});
