import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NoteFormat, NoteResponse } from '@clinical-scribe/shared';
import { IFileManager } from '../../src/domain';
import { NoteExporter, toBaseName } from '../../src/services/exporter';

describe('toBaseName', () => {
  it('drops folders and the media extension', () => {
    expect(toBaseName('/recordings/visit-2024.m4a')).toBe('visit-2024');
    expect(toBaseName('C:\\recordings\\follow up.wav')).toBe('follow_up');
  });

  it('uses the last path segment of a URL without its query', () => {
    expect(toBaseName('https://cdn.test/visit 1.mp3?sig=x')).toBe('visit_1');
  });

  it('falls back to "note" when nothing usable is left', () => {
    expect(toBaseName('???')).toBe('note');
    expect(toBaseName('')).toBe('note');
  });
});

describe('NoteExporter', () => {
  const note: NoteResponse = {
    format: NoteFormat.SOAP,
    noteText: 'SOAP NOTE\nPatient Name: Not mentioned.\n',
    markdown: '# SOAP NOTE\n\nPatient Name: Not mentioned.',
    producingModel: 'template-fallback'
  };

  let files: { [K in keyof IFileManager]: ReturnType<typeof vi.fn> };
  let existing: Set<string>;

  beforeEach(() => {
    existing = new Set();
    files = {
      readFile: vi.fn(),
      writeFile: vi.fn().mockResolvedValue(undefined),
      fileExists: vi.fn(async (p: string) => existing.has(p)),
      joinPathsInProjectFolder: vi.fn((...parts: string[]) => ['/notes', ...parts].join('/'))
    };
  });

  it('writes the markdown and the raw text side by side', async () => {
    const exported = await new NoteExporter(files).exportNote('visit', note);

    expect(exported).toEqual({ markdownPath: '/notes/visit.md', textPath: '/notes/visit.txt' });
    expect(files.writeFile).toHaveBeenCalledWith('/notes/visit.md', note.markdown);
    expect(files.writeFile).toHaveBeenCalledWith('/notes/visit.txt', note.noteText);
  });

  it('never overwrites an earlier export', async () => {
    existing.add('/notes/visit.md');
    existing.add('/notes/visit-1.txt');

    const exported = await new NoteExporter(files).exportNote('visit', note);

    expect(exported).toEqual({ markdownPath: '/notes/visit-2.md', textPath: '/notes/visit-2.txt' });
  });
});
