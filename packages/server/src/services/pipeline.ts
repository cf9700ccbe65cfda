import { ModelAttempt, NoteRequest, TEMPLATE_FALLBACK } from '@clinical-scribe/shared';
import { ConfigurationError } from '../domain/errors';
import { RenderedNote, ScribeRequest, ScribeResult } from '../domain/models';
import { ITranscriptionClient } from '../domain/ports';
import { beautifyNote } from './beautifier';
import { buildFallbackNote } from './fallbackNote';
import { NoteGenerator } from './noteGenerator';
import { formatUtterances } from './utterances';

/**
 * Sequences a request: upload → submit → poll → utterances → note → markdown.
 * Transcription failures abort the request; note generation always degrades
 * to the template fallback instead.
 */
export class ScribePipeline {
  constructor(
    private readonly transcriber: ITranscriptionClient | null,
    private readonly notes: NoteGenerator
  ) {}

  public get canTranscribe(): boolean {
    return this.transcriber !== null;
  }

  public get canGenerate(): boolean {
    return this.notes.isConfigured;
  }

  public async run(request: ScribeRequest): Promise<ScribeResult> {
    const transcriber = this.transcriber;
    if (!transcriber) {
      throw new ConfigurationError('Transcription API key is not configured. Set ASSEMBLYAI_API_KEY.');
    }

    const { source, format, speakerLabels, signal } = request;

    // --- STEP 1: AUDIO URL ---
    const audioUrl = source.kind === 'bytes'
      ? await transcriber.upload(source.data, { signal })
      : source.url;

    // --- STEP 2: SUBMIT & WAIT ---
    const jobId = await transcriber.submit(audioUrl, speakerLabels, { signal });
    const job = await transcriber.poll(jobId, { signal });

    // --- STEP 3: TRANSCRIPT ---
    const transcriptText = job.fullText ?? '';
    const utterances = formatUtterances(job.utterances, transcriptText);
    console.log(`   [Job ${job.id}] ${utterances.length} utterance(s), ${transcriptText.length} chars`);

    // --- STEP 4: NOTE ---
    const rendered = await this.noteFromTranscript({ transcriptText, format });

    return { job, utterances, ...rendered };
  }

  /**
   * Generates (or falls back to) a note for a transcript that already exists.
   */
  public async noteFromTranscript(request: NoteRequest): Promise<RenderedNote> {
    let rawText = '';
    let producingModel = TEMPLATE_FALLBACK;
    let attempts: ModelAttempt[] = [];

    if (this.notes.isConfigured && request.transcriptText.trim()) {
      const outcome = await this.notes.generate(request);
      attempts = outcome.attempts;
      if (outcome.model && outcome.text.trim()) {
        rawText = outcome.text;
        producingModel = outcome.model;
      }
    }

    if (!rawText) {
      console.log(`📄 Using ${request.format} template fallback.`);
      rawText = buildFallbackNote(request.transcriptText, request.format);
    }

    return {
      note: { rawText, producingModel, attempts },
      markdown: beautifyNote(rawText),
    };
  }
}
