import { NoteFormat } from '@clinical-scribe/shared';
import { NodeFileSystem } from '../utils/nodeFS';
import { IFileManager } from '../domain';
import { promptForFormat } from '../ui/prompts';
import { CommandDeps, defaultDeps, describeFailure, ensureServerOnline, saveNote } from './scribe';

export interface NoteCommandOptions {
  format?: NoteFormat;
  out?: string;
}

/**
 * Regenerates a note from a transcript saved earlier, without transcribing again.
 */
export async function noteCommand(
  transcriptFile: string,
  opts: NoteCommandOptions = {},
  deps: CommandDeps = defaultDeps,
  files: IFileManager = new NodeFileSystem(process.cwd())
): Promise<boolean> {
  if (!(await files.fileExists(transcriptFile))) {
    console.error(`❌ Transcript not found: ${transcriptFile}`);
    return false;
  }

  const transcriptText = await files.readFile(transcriptFile);
  if (!transcriptText.trim()) {
    console.log('⚠️ Transcript is empty; the note will be a blank template.');
  }

  if (!(await ensureServerOnline(deps.api))) return false;
  const format = opts.format ?? await promptForFormat();

  try {
    console.log(`🧠 Generating ${format} note...`);
    const note = await deps.api.generateNote(transcriptText, format);

    console.log(`\n--- ${note.format} NOTE (${note.producingModel}) ---`);
    console.log(note.noteText);

    await saveNote(deps, transcriptFile, note, opts.out);
    return true;
  } catch (error) {
    console.error(`❌ Note Error: ${describeFailure(error)}`);
    return false;
  }
}
