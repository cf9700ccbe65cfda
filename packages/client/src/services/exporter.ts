import { NoteResponse } from '@clinical-scribe/shared';
import { ExportedNote, IFileManager, INoteExporter } from '../domain';

/**
 * Strips the media extension and anything a filesystem would reject,
 * e.g. "https://cdn.test/visit 1.mp3?sig=x" -> "visit_1".
 */
export function toBaseName(source: string): string {
  const last = source.split(/[\\/]/).filter(Boolean).pop() ?? '';
  const withoutQuery = last.split(/[?#]/)[0];
  const stem = withoutQuery.replace(/\.[^/.]+$/, '');
  const safe = stem.replace(/[^a-zA-Z0-9._-]+/g, '_').replace(/^_+|_+$/g, '');
  return safe || 'note';
}

export class NoteExporter implements INoteExporter {
  constructor(private readonly fs: IFileManager) {}

  /**
   * Writes `<name>.md` and `<name>.txt` side by side. Existing exports are
   * never overwritten: a numeric suffix is added instead.
   */
  public async exportNote(baseName: string, note: NoteResponse): Promise<ExportedNote> {
    const name = await this.freeName(baseName);

    const markdownPath = this.fs.joinPathsInProjectFolder(`${name}.md`);
    const textPath = this.fs.joinPathsInProjectFolder(`${name}.txt`);

    await this.fs.writeFile(markdownPath, note.markdown);
    await this.fs.writeFile(textPath, note.noteText);

    return { markdownPath, textPath };
  }

  private async freeName(baseName: string): Promise<string> {
    let candidate = baseName;
    for (let n = 1; await this.taken(candidate); n++) {
      candidate = `${baseName}-${n}`;
    }
    return candidate;
  }

  private async taken(name: string): Promise<boolean> {
    const [md, txt] = await Promise.all([
      this.fs.fileExists(this.fs.joinPathsInProjectFolder(`${name}.md`)),
      this.fs.fileExists(this.fs.joinPathsInProjectFolder(`${name}.txt`)),
    ]);
    return md || txt;
  }
}
