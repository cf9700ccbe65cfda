import { describe, it, expect } from 'vitest';
import { formatUtterances, GENERIC_SPEAKER, UNKNOWN_SPEAKER } from '../../src/services/utterances';

describe('formatUtterances', () => {
  it('converts millisecond timestamps to seconds', () => {
    const result = formatUtterances([
      { speaker: 'A', text: 'Hello doctor.', start: 1500, end: 3250 },
      { speaker: 'B', text: 'Good morning.', start: 4000, end: 5000 },
    ]);

    expect(result).toEqual([
      { speaker: 'A', text: 'Hello doctor.', startSeconds: 1.5, endSeconds: 3.25 },
      { speaker: 'B', text: 'Good morning.', startSeconds: 4, endSeconds: 5 },
    ]);
  });

  it('fills defaults for malformed records instead of throwing', () => {
    const result = formatUtterances([null, 'garbage', { speaker: 2, start: 'soon' }]);

    expect(result).toHaveLength(3);
    expect(result[0]).toEqual({ speaker: UNKNOWN_SPEAKER, text: '', startSeconds: 0, endSeconds: 0 });
    expect(result[1]).toEqual({ speaker: UNKNOWN_SPEAKER, text: '', startSeconds: 0, endSeconds: 0 });
    expect(result[2]).toEqual({ speaker: '2', text: '', startSeconds: 0, endSeconds: 0 });
  });

  it('returns one generic utterance when only the full text exists', () => {
    expect(formatUtterances(undefined, 'Patient denies fever.')).toEqual([
      { speaker: GENERIC_SPEAKER, text: 'Patient denies fever.', startSeconds: 0, endSeconds: 0 },
    ]);
    expect(formatUtterances([], 'Patient denies fever.')).toHaveLength(1);
  });

  it('returns an empty list when there is nothing at all', () => {
    expect(formatUtterances(undefined)).toEqual([]);
    expect(formatUtterances([], '')).toEqual([]);
  });
});
