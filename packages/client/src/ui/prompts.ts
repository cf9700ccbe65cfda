import inquirer from 'inquirer';
import { NoteFormat } from '@clinical-scribe/shared';
import { TranscribeOptions } from '../domain';

const FORMAT_LABELS: Record<NoteFormat, string> = {
  [NoteFormat.SOAP]: 'SOAP note',
  [NoteFormat.HP]: 'History & Physical (H&P)'
};

/**
 * Prompts for a local audio file path or a hosted audio URL.
 */
export async function promptForSource(): Promise<string> {
  const { source } = await inquirer.prompt<{ source: string }>([{
    type: 'input',
    name: 'source',
    message: 'Audio file path or URL:',
    filter: (input: string) => input.trim().replace(/^["']|["']$/g, ''), // drag-and-drop adds quotes
    validate: (input: string) => input.trim() !== '' ? true : 'A file or URL is required'
  }]);

  return source;
}

export async function promptForFormat(defaultFormat: NoteFormat = NoteFormat.SOAP): Promise<NoteFormat> {
  const { format } = await inquirer.prompt<{ format: NoteFormat }>([{
    type: 'list',
    name: 'format',
    message: 'Select note format:',
    choices: Object.values(NoteFormat).map(value => ({ name: FORMAT_LABELS[value], value })),
    default: defaultFormat
  }]);

  return format;
}

/**
 * Prompts for the note format and, unless already given, diarization
 * for a single recording.
 * @param label File name or URL, shown for context.
 */
export async function promptForScribeOptions(label: string, speakerLabels?: boolean): Promise<TranscribeOptions> {
  console.log(`\n🎧 ${label}`);
  const format = await promptForFormat();
  if (speakerLabels !== undefined) return { format, speakerLabels };

  const answer = await inquirer.prompt<{ speakerLabels: boolean }>([{
    type: 'confirm',
    name: 'speakerLabels',
    message: 'Separate speakers (clinician / patient)?',
    default: true
  }]);

  return { format, speakerLabels: answer.speakerLabels };
}
