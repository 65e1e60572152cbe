/**
 * Readers for untyped JSON request bodies. Each returns undefined when the
 * field is absent and null when it is present but of the wrong shape.
 */

export type Body = Record<string, unknown>;

export function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(body: Body, key: string): string | null | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

export function readStringArray(body: Body, key: string): string[] | null | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) return null;

  const strings = value.filter((item): item is string => typeof item === 'string' && item !== '');
  return strings.length === value.length ? strings : null;
}

export function readBoolean(body: Body, key: string): boolean | null | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'boolean' ? value : null;
}

export function readNumber(body: Body, key: string): number | null | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
