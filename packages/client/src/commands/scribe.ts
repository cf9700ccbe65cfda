import path from 'path';
import { NoteFormat, NoteResponse, ScribeResponse } from '@clinical-scribe/shared';
import { apiService } from '../services/api';
import { configService } from '../services/config';
import { NoteExporter, toBaseName } from '../services/exporter';
import { ApiError, IApiService, INoteExporter, TranscribeOptions } from '../domain';
import { NodeFileSystem } from '../utils/nodeFS';
import { promptForScribeOptions, promptForSource } from '../ui/prompts';
import { formatTranscript } from '../ui/transcript';

export interface ScribeCommandOptions {
  format?: NoteFormat;
  speakerLabels?: boolean;
  out?: string;
}

export interface CommandDeps {
  api: IApiService;
  exporterFor(outputDir: string): INoteExporter;
  outputDir(): string;
}

export const defaultDeps: CommandDeps = {
  api: apiService,
  exporterFor: (outputDir) => new NoteExporter(new NodeFileSystem(outputDir)),
  outputDir: () => configService.get('paths').output
};

export function isAudioUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

export function describeFailure(error: unknown): string {
  if (error instanceof ApiError) {
    const status = error.statusCode ? ` (HTTP ${error.statusCode})` : '';
    const hint = error.isTransient ? ' Check that the server is running and reachable.' : '';
    return `${error.message.replace(/\.$/, '')}${status}.${hint}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export async function ensureServerOnline(api: IApiService): Promise<boolean> {
  const health = await api.checkHealth();
  if (!health.isOnline) {
    console.error('❌ Server is OFFLINE. Please start the server and try again.');
    return false;
  }
  console.log(`🟢 Server online (${health.latencyMs}ms)`);
  if (health.generation === false) {
    console.log('⚠️ Server has no model key; notes will use the template.');
  }
  return true;
}

export async function saveNote(
  deps: CommandDeps,
  source: string,
  note: NoteResponse,
  out?: string
): Promise<void> {
  const outputDir = out ? path.resolve(out) : deps.outputDir();
  const exported = await deps.exporterFor(outputDir).exportNote(toBaseName(source), note);
  console.log(`💾 Saved ${exported.markdownPath}`);
  console.log(`💾 Saved ${exported.textPath}`);
}

function printResult(result: ScribeResponse): void {
  const duration = result.audioDurationSeconds ? `, ${Math.round(result.audioDurationSeconds)}s of audio` : '';
  console.log(`\n✅ Transcription complete. Job ID: ${result.jobId}${duration}`);

  console.log('\n--- TRANSCRIPT ---');
  console.log(result.utterances.length > 0 ? formatTranscript(result.utterances) : '(no speech detected)');

  console.log(`\n--- ${result.format} NOTE (${result.producingModel}) ---`);
  console.log(result.noteText);
}

/**
 * Sends a file or URL to the server, prints the diarized transcript and
 * the note, then exports the note next to the other outputs.
 */
export async function scribeCommand(
  sourceArg?: string,
  opts: ScribeCommandOptions = {},
  deps: CommandDeps = defaultDeps
): Promise<boolean> {
  if (!(await ensureServerOnline(deps.api))) return false;

  const source = sourceArg?.trim() || await promptForSource();
  const label = isAudioUrl(source) ? source : path.basename(source);

  const options: TranscribeOptions = opts.format
    ? { format: opts.format, speakerLabels: opts.speakerLabels ?? true }
    : await promptForScribeOptions(label, opts.speakerLabels);

  try {
    console.log('⏳ Transcription runs on the server; long recordings take a few minutes.');
    let result: ScribeResponse;
    if (isAudioUrl(source)) {
      console.log(`\n📨 Submitting URL: ${source}`);
      result = await deps.api.transcribeUrl(source, options);
    } else {
      console.log(`\n📤 Uploading: ${label}`);
      let lastShown = -1;
      result = await deps.api.transcribeFile(source, options, (percent) => {
        if (percent !== lastShown && percent % 10 === 0) {
          lastShown = percent;
          console.log(`   ${percent}%`);
        }
      });
    }

    printResult(result);
    await saveNote(deps, source, result, opts.out);
    return true;
  } catch (error) {
    console.error(`❌ Scribe Error: ${describeFailure(error)}`);
    return false;
  }
}
