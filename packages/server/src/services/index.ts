import { ServerConfig } from '../config/env';
import { createModelSelector } from './modelSelector';
import { NoteGenerator } from './noteGenerator';
import { ScribePipeline } from './pipeline';
import { TranscriptionClient } from './transcriber';

export * from './beautifier';
export * from './fallbackNote';
export * from './modelSelector';
export * from './noteGenerator';
export * from './pipeline';
export * from './transcriber';
export * from './utterances';

export function createPipeline(config: ServerConfig): ScribePipeline {
  const { transcription, generation } = config;

  if (!transcription.apiKey) {
    console.warn('⚠️ ASSEMBLYAI_API_KEY is missing. /scribe will answer 503.');
  }

  const transcriber = transcription.apiKey
    ? new TranscriptionClient({
        apiKey: transcription.apiKey,
        baseURL: transcription.baseURL,
        pollIntervalMs: transcription.pollIntervalMs,
        pollTimeoutMs: transcription.pollTimeoutMs,
      })
    : null;

  const notes = new NoteGenerator(createModelSelector(generation.apiKey, generation.models));
  return new ScribePipeline(transcriber, notes);
}
