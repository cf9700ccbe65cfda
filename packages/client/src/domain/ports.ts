import { NoteFormat, NoteResponse, ScribeResponse } from '@clinical-scribe/shared';
import { ExportedNote, HealthStatus, TranscribeOptions } from './models';

export interface IApiService {
  resetClient(): void;
  checkHealth(): Promise<HealthStatus>;
  /**
   * Uploads a local recording via multipart/form-data and waits for the note.
   * @param onProgress Optional callback to track upload percentage.
   */
  transcribeFile(
    filePath: string,
    options: TranscribeOptions,
    onProgress?: (percentCompleted: number) => void
  ): Promise<ScribeResponse>;
  transcribeUrl(audioUrl: string, options: TranscribeOptions): Promise<ScribeResponse>;
  generateNote(transcriptText: string, format: NoteFormat): Promise<NoteResponse>;
}

export interface INoteExporter {
  exportNote(baseName: string, note: NoteResponse): Promise<ExportedNote>;
}

export interface IFileManager {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  fileExists(filePath: string): Promise<boolean>;
  joinPathsInProjectFolder(...parts: string[]): string;
}
