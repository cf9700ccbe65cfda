import { describe, it, expect } from 'vitest';
import { NoteFormat, parseTranscriptStatus } from './index';

describe('Shared Definitions', () => {
  it('should have correct note format tags', () => {
    expect(NoteFormat.SOAP).toBe('SOAP');
    expect(NoteFormat.HP).toBe('HP');
  });

  it('should keep known transcript statuses as they are', () => {
    expect(parseTranscriptStatus('queued')).toBe('queued');
    expect(parseTranscriptStatus('completed')).toBe('completed');
    expect(parseTranscriptStatus('error')).toBe('error');
  });

  it('should read unknown or missing statuses as still processing', () => {
    expect(parseTranscriptStatus('throttled')).toBe('processing');
    expect(parseTranscriptStatus(undefined)).toBe('processing');
    expect(parseTranscriptStatus(42)).toBe('processing');
  });
});
