import { Utterance } from '@clinical-scribe/shared';
import { isRecord } from '../utils/helper';

export const UNKNOWN_SPEAKER = 'Unknown';
export const GENERIC_SPEAKER = 'Speaker';

function msToSeconds(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value / 1000 : 0;
}

function asText(value: unknown, fallback: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value); // speakers can come back as numeric ids
  return fallback;
}

/**
 * Normalizes diarization records from the transcription service.
 * Never throws: malformed records still yield an utterance with defaults.
 *
 * @param records Raw `utterances` array from the job payload, if any.
 * @param fullText The flat transcript, used when there are no records.
 */
export function formatUtterances(records: readonly unknown[] | undefined, fullText?: string): Utterance[] {
  if (records && records.length > 0) {
    return records.map(record => {
      const raw = isRecord(record) ? record : {};
      return {
        speaker: asText(raw.speaker, UNKNOWN_SPEAKER),
        text: asText(raw.text, ''),
        startSeconds: msToSeconds(raw.start),
        endSeconds: msToSeconds(raw.end),
      };
    });
  }

  if (fullText) {
    return [{ speaker: GENERIC_SPEAKER, text: fullText, startSeconds: 0, endSeconds: 0 }];
  }

  return [];
}
