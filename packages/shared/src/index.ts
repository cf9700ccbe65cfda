export enum NoteFormat {
  SOAP = 'SOAP',
  HP = 'HP'       // History & Physical
}

// Service-side job states. Anything the service adds later is read as still pending.
export type TranscriptStatus = 'queued' | 'processing' | 'completed' | 'error';

export function parseTranscriptStatus(value: unknown): TranscriptStatus {
  switch (value) {
    case 'queued':
    case 'processing':
    case 'completed':
    case 'error':
      return value;
    default:
      return 'processing';
  }
}

export interface Utterance {
  speaker: string;
  text: string;
  startSeconds: number;
  endSeconds: number;
}

export interface TranscriptionJob {
  id: string;
  status: TranscriptStatus;
  fullText?: string;
  utterances?: unknown[]; // raw diarization records, normalized later
  errorDetail?: string;
  languageCode?: string;
  audioDurationSeconds?: number;
}

export interface NoteRequest {
  transcriptText: string;
  format: NoteFormat;
}

export const TEMPLATE_FALLBACK = 'template-fallback';

export type AttemptStage = 'probe' | 'generate';

export interface ModelAttempt {
  model: string;
  stage: AttemptStage;
  reason: string;
}

export interface NoteResult {
  rawText: string;
  producingModel: string; // model id, or TEMPLATE_FALLBACK
  attempts: ModelAttempt[];
}

// --- HTTP contracts ---

export interface ScribeUrlRequest {
  audioUrl: string;
  format?: NoteFormat;
  speakerLabels?: boolean;
}

export interface NoteFromTranscriptRequest {
  transcriptText: string;
  format?: NoteFormat;
}

export interface NoteResponse {
  format: NoteFormat;
  noteText: string;
  markdown: string;
  producingModel: string;
}

export interface ScribeResponse extends NoteResponse {
  jobId: string;
  status: TranscriptStatus;
  transcriptText: string;
  utterances: Utterance[];
  languageCode?: string;
  audioDurationSeconds?: number;
}

export interface HealthResponse {
  status: 'online';
  service: string;
  generation: boolean;
}

export interface ErrorResponse {
  error: string;
}
