/**
 * Converts SRT timestamp format (HH:MM:SS,mmm) to milliseconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm" or "HH:MM:SS.mmm"
 * @returns Time in milliseconds
 */
export function srtTimeToMs(timestamp: string): number {
  // Normalize separator (SRT uses comma, some use period)
  const normalized = timestamp.trim().replace(',', '.');
  const parts = normalized.split(':');

  if (parts.length !== 3) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const milliseconds = parseInt((secondsParts[1] ?? '0').padEnd(3, '0').slice(0, 3), 10);

  if ([hours, minutes, seconds, milliseconds].some((value) => isNaN(value))) {
    throw new Error(`Invalid SRT timestamp format: ${timestamp}`);
  }

  return (hours * 3600 + minutes * 60 + seconds) * 1000 + milliseconds;
}

/**
 * Converts milliseconds to SRT timestamp format (HH:MM:SS,mmm)
 * @param ms - Time in milliseconds, negative values clamp to zero
 * @param separator - Millisecond separator, "," by default
 */
export function msToSrtTime(ms: number, separator: string = ','): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3600000);
  const minutes = Math.floor((total % 3600000) / 60000);
  const secs = Math.floor((total % 60000) / 1000);
  const millis = total % 1000;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}${separator}` +
    `${millis.toString().padStart(3, '0')}`
  );
}

const CUE_TIMING_PATTERN =
  /(\d{2,}:\d{2}:\d{2})([,.])(\d{3})(\s*-->\s*)(\d{2,}:\d{2}:\d{2})([,.])(\d{3})/g;

/**
 * Shifts every cue timing line of an SRT file. Only the timestamps are
 * rewritten; cue numbers, text and line endings are left as they are.
 * @param content - The raw SRT file content
 * @param shiftMs - Signed offset; each boundary clamps to zero independently
 * @returns The shifted content and how many cues were touched
 */
export function shiftSrtContent(content: string, shiftMs: number): { content: string; cues: number } {
  let cues = 0;

  const shifted = content.replace(
    CUE_TIMING_PATTERN,
    (
      _match: string,
      startBase: string,
      startSep: string,
      startMs: string,
      arrow: string,
      endBase: string,
      endSep: string,
      endMs: string
    ) => {
      cues++;
      const start = srtTimeToMs(`${startBase}.${startMs}`) + shiftMs;
      const end = srtTimeToMs(`${endBase}.${endMs}`) + shiftMs;
      return `${msToSrtTime(start, startSep)}${arrow}${msToSrtTime(end, endSep)}`;
    }
  );

  return { content: shifted, cues };
}
