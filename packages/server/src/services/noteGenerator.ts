import { NoteRequest } from '@clinical-scribe/shared';
import { fieldLine, getNoteFormat, TRANSCRIPT_PLACEHOLDER } from '../config/noteFormats';
import { GenerationOutcome, ModelFallbackSelector } from './modelSelector';

/**
 * Renders the prompt template for a format, with the transcript slot left open.
 */
export function renderPromptTemplate(format: NoteRequest['format']): string {
  const definition = getNoteFormat(format);

  const lines: string[] = [...definition.instructions, '', 'Format exactly as follows:', '', definition.title];
  if (definition.spacedTitle) lines.push('');

  for (const field of definition.headerFields) {
    lines.push(fieldLine({ bullet: false }, field, field.hint ?? ''));
  }

  for (const section of definition.sections) {
    lines.push('', section.heading);
    for (const field of section.fields ?? []) {
      lines.push(fieldLine(section, field, field.hint ?? ''));
    }
    lines.push(...(section.guidance ?? []));
  }

  lines.push(
    '',
    `Now generate the ${definition.noun} based on the following transcript:`,
    '',
    '[TRANSCRIPT]',
    TRANSCRIPT_PLACEHOLDER,
    ''
  );

  return lines.join('\n');
}

export function buildNotePrompt(request: NoteRequest): string {
  // A replacer function keeps "$&"-style sequences in the transcript literal
  return renderPromptTemplate(request.format).replace(TRANSCRIPT_PLACEHOLDER, () => request.transcriptText);
}

export class NoteGenerator {
  constructor(private readonly selector: ModelFallbackSelector) {}

  public get isConfigured(): boolean {
    return this.selector.isConfigured;
  }

  public async generate(request: NoteRequest): Promise<GenerationOutcome> {
    console.log(`🧠 Generating ${request.format} note (${request.transcriptText.length} chars of transcript)...`);
    return this.selector.generate(buildNotePrompt(request));
  }
}
