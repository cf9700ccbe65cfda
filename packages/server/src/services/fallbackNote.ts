import { NoteFormat } from '@clinical-scribe/shared';
import { fieldLine, getNoteFormat, NOT_MENTIONED } from '../config/noteFormats';

/**
 * Deterministic note used when no model produced text.
 * Every field reads "Not mentioned." except History of Present Illness,
 * which carries the transcript verbatim (trimmed).
 */
export function buildFallbackNote(transcriptText: string, format: NoteFormat): string {
  const definition = getNoteFormat(format);
  const narrative = (transcriptText || '').trim() || NOT_MENTIONED;

  const lines: string[] = [definition.title];
  if (definition.spacedTitle) lines.push('');

  for (const field of definition.headerFields) {
    lines.push(fieldLine({ bullet: false }, field, NOT_MENTIONED));
  }

  for (const section of definition.sections) {
    lines.push('', section.heading);
    for (const field of section.fields ?? []) {
      lines.push(fieldLine(section, field, field.narrative ? narrative : NOT_MENTIONED));
    }
    lines.push(...(section.fallback ?? []));
  }

  return lines.join('\n') + '\n';
}
