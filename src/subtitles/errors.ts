/**
 * Raised when a subtitle file lacks something a transform needs.
 * Transforms catch it at their boundary and return the input path.
 */
export class SubtitleFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubtitleFormatError';
  }
}
