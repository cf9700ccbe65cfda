import { describe, it, expect, vi } from 'vitest';
import { NoteFormat } from '@clinical-scribe/shared';
import { TRANSCRIPT_PLACEHOLDER } from '../../src/config/noteFormats';
import { ModelFallbackSelector } from '../../src/services/modelSelector';
import { buildNotePrompt, NoteGenerator, renderPromptTemplate } from '../../src/services/noteGenerator';

describe('renderPromptTemplate', () => {
  it('lays out the SOAP skeleton with field hints', () => {
    const template = renderPromptTemplate(NoteFormat.SOAP);
    const lines = template.split('\n');

    expect(lines[0]).toBe('You are a medical documentation assistant.');
    expect(lines).toContain('Format exactly as follows:');
    expect(lines).toContain('Setting: (telemedicine / in-person) — based on transcript');
    expect(lines).toContain('• Chief Complaint:');
    expect(lines).toContain('A – Assessment');
    expect(template.endsWith(`[TRANSCRIPT]\n${TRANSCRIPT_PLACEHOLDER}\n`)).toBe(true);
  });

  it('asks for the H&P note by name', () => {
    const template = renderPromptTemplate(NoteFormat.HP);

    expect(template).toContain('\nHISTORY & PHYSICAL (H&P)\n\nPatient Name:\n');
    expect(template).toContain('Now generate the H&P note based on the following transcript:');
    expect(template).toContain('(Only list items explicitly found in the transcript.)');
  });
});

describe('buildNotePrompt', () => {
  it('inserts the transcript in place of the placeholder', () => {
    const prompt = buildNotePrompt({ transcriptText: 'Patient denies fever.', format: NoteFormat.SOAP });

    expect(prompt).not.toContain(TRANSCRIPT_PLACEHOLDER);
    expect(prompt.endsWith('[TRANSCRIPT]\nPatient denies fever.\n')).toBe(true);
  });

  it('keeps replacement patterns in the transcript literal', () => {
    const prompt = buildNotePrompt({ transcriptText: 'cost was $& and $1', format: NoteFormat.HP });

    expect(prompt.endsWith('[TRANSCRIPT]\ncost was $& and $1\n')).toBe(true);
  });
});

describe('NoteGenerator', () => {
  it('sends the built prompt to the selector', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const selector = new ModelFallbackSelector(null);
    const generate = vi.spyOn(selector, 'generate').mockResolvedValue({ text: 'note', model: 'm1', attempts: [] });
    const request = { transcriptText: 'Patient denies fever.', format: NoteFormat.SOAP };

    const outcome = await new NoteGenerator(selector).generate(request);

    expect(generate).toHaveBeenCalledWith(buildNotePrompt(request));
    expect(outcome.model).toBe('m1');
  });
});
