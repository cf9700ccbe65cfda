import { NOTE_FORMATS, NoteFormatDefinition } from '../config/noteFormats';

const BULLET = '•';

interface HeadingSets {
  titles: Set<string>;
  sections: Set<string>;
}

export function collectHeadings(definitions: readonly NoteFormatDefinition[] = Object.values(NOTE_FORMATS)): HeadingSets {
  return {
    titles: new Set(definitions.map(d => d.title)),
    sections: new Set(definitions.flatMap(d => d.sections.map(s => s.heading))),
  };
}

const DEFAULT_HEADINGS = collectHeadings();

/**
 * Turns flat note text into markdown, one line at a time:
 * titles become `#`, section headings `##`, and "Label:" lines bold.
 * Each source line is emitted as its own paragraph.
 */
export function beautifyNote(noteText: string, headings: HeadingSets = DEFAULT_HEADINGS): string {
  const lines = noteText ? noteText.split(/\r?\n/) : [];
  if (lines[lines.length - 1] === '') lines.pop(); // trailing newline ends the last line, it is not a blank one

  const out = lines.map(raw => {
    const line = raw.trim();
    if (!line) return '';
    if (headings.titles.has(line)) return `# ${line}`;
    if (headings.sections.has(line)) return `## ${line}`;
    if (line.endsWith(':') && !line.startsWith(BULLET)) return `**${line}**`;
    return line;
  });

  return out.join('\n\n');
}
