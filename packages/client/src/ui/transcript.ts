import { Utterance } from '@clinical-scribe/shared';

export function formatTimestamp(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const minutes = Math.floor(total / 60);
  const rest = total % 60;
  return `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

export function formatUtteranceLine(utterance: Utterance): string {
  return `[${formatTimestamp(utterance.startSeconds)}] SPEAKER ${utterance.speaker}: ${utterance.text}`;
}

export function formatTranscript(utterances: readonly Utterance[]): string {
  return utterances.map(formatUtteranceLine).join('\n');
}
