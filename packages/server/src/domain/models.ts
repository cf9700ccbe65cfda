import { NoteFormat, NoteResult, TranscriptionJob, Utterance } from '@clinical-scribe/shared';

export type AudioSource =
  | { kind: 'bytes'; data: Uint8Array; filename?: string }
  | { kind: 'url'; url: string };

export interface ScribeRequest {
  source: AudioSource;
  format: NoteFormat;
  speakerLabels: boolean;
  signal?: AbortSignal;
}

export interface RenderedNote {
  note: NoteResult;
  markdown: string;
}

export interface ScribeResult extends RenderedNote {
  job: TranscriptionJob;
  utterances: Utterance[];
}
