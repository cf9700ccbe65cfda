import { FastifyInstance } from 'fastify';
import { NoteResponse } from '@clinical-scribe/shared';
import { BadRequestError } from '../domain/errors';
import { ScribePipeline } from '../services';
import { isRecord, parseNoteFormat } from '../utils/helper';

export interface NoteRouteOptions {
  pipeline: ScribePipeline;
}

/**
 * Regenerates a note for a transcript the caller already has,
 * e.g. to switch between SOAP and H&P without transcribing again.
 */
export async function noteRoutes(server: FastifyInstance, opts: NoteRouteOptions) {
  const { pipeline } = opts;

  server.post<{ Reply: NoteResponse }>('/notes', async (req) => {
    const body = isRecord(req.body) ? req.body : {};
    const transcriptText = body.transcriptText;

    if (typeof transcriptText !== 'string') {
      throw new BadRequestError('transcriptText is required.');
    }

    const format = parseNoteFormat(body.format);
    const { note, markdown } = await pipeline.noteFromTranscript({ transcriptText, format });

    return {
      format,
      noteText: note.rawText,
      markdown,
      producingModel: note.producingModel,
    };
  });
}
