import { NoteFormat } from '@clinical-scribe/shared';
import { BadRequestError } from '../domain/errors';

/**
 * Reads the `format` field. Absent means SOAP; "HP", "h&p" and similar
 * spellings mean H&P; anything else is rejected.
 */
export function parseNoteFormat(value: unknown): NoteFormat {
  if (value === undefined || value === null || value === '') return NoteFormat.SOAP;

  const normalized = typeof value === 'string' ? value.trim().toUpperCase().replace('&', '') : value;
  const match = Object.values(NoteFormat).find(format => format === normalized);
  if (!match) {
    throw new BadRequestError(`Unknown note format "${String(value)}". Use SOAP or HP.`);
  }
  return match;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a boolean form/JSON field, accepting "true"/"false" strings from multipart bodies.
 */
export function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  }
  return fallback;
}
