import { NoteFormat } from '@clinical-scribe/shared';

/**
 * Accepts "soap", "HP", "h&p" and similar spellings.
 */
export function parseFormatOption(value: string | undefined): NoteFormat | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toUpperCase().replace('&', '');
  return Object.values(NoteFormat).find(format => format === normalized);
}
