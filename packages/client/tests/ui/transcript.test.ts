import { describe, it, expect } from 'vitest';
import { formatTimestamp, formatTranscript, formatUtteranceLine } from '../../src/ui/transcript';
import { parseFormatOption } from '../../src/utils/formats';
import { NoteFormat } from '@clinical-scribe/shared';

describe('formatTimestamp', () => {
  it('prints minutes and seconds, rounding down', () => {
    expect(formatTimestamp(0)).toBe('00:00');
    expect(formatTimestamp(1.5)).toBe('00:01');
    expect(formatTimestamp(75.9)).toBe('01:15');
    expect(formatTimestamp(3600)).toBe('60:00');
  });

  it('treats negative or invalid values as zero', () => {
    expect(formatTimestamp(-4)).toBe('00:00');
    expect(formatTimestamp(Number.NaN)).toBe('00:00');
  });
});

describe('formatTranscript', () => {
  it('prints one speaker line per utterance', () => {
    const utterances = [
      { speaker: 'A', text: 'What brings you in today?', startSeconds: 0.25, endSeconds: 2 },
      { speaker: 'B', text: 'A cough for three days.', startSeconds: 62, endSeconds: 64 },
    ];

    expect(formatUtteranceLine(utterances[0])).toBe('[00:00] SPEAKER A: What brings you in today?');
    expect(formatTranscript(utterances)).toBe(
      '[00:00] SPEAKER A: What brings you in today?\n[01:02] SPEAKER B: A cough for three days.'
    );
  });
});

describe('parseFormatOption', () => {
  it('accepts the usual spellings', () => {
    expect(parseFormatOption('soap')).toBe(NoteFormat.SOAP);
    expect(parseFormatOption('HP')).toBe(NoteFormat.HP);
    expect(parseFormatOption(' h&p ')).toBe(NoteFormat.HP);
  });

  it('rejects anything else', () => {
    expect(parseFormatOption('DAP')).toBeUndefined();
    expect(parseFormatOption(undefined)).toBeUndefined();
  });
});
