import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { NoteFormat, ScribeResponse } from '@clinical-scribe/shared';
import { BadRequestError } from '../domain/errors';
import { AudioSource, ScribeRequest, ScribeResult } from '../domain/models';
import { ScribePipeline } from '../services';
import { isRecord, parseBoolean, parseNoteFormat } from '../utils/helper';

export interface ScribeRouteOptions {
  pipeline: ScribePipeline;
}

export function toScribeResponse(format: NoteFormat, result: ScribeResult): ScribeResponse {
  const { job, utterances, note, markdown } = result;
  return {
    jobId: job.id,
    status: job.status,
    transcriptText: job.fullText ?? '',
    utterances,
    languageCode: job.languageCode,
    audioDurationSeconds: job.audioDurationSeconds,
    format,
    noteText: note.rawText,
    markdown,
    producingModel: note.producingModel,
  };
}

/**
 * Reads either a multipart upload (one audio `file` part plus fields)
 * or a JSON body carrying `audioUrl`.
 */
async function readScribeRequest(req: FastifyRequest): Promise<Omit<ScribeRequest, 'signal'>> {
  const fields: Record<string, unknown> = {};
  let source: AudioSource | undefined;

  if (req.isMultipart()) {
    for await (const part of req.parts()) {
      if (part.type === 'file') {
        const data = await part.toBuffer();
        if (data.byteLength > 0) source = { kind: 'bytes', data, filename: part.filename };
      } else {
        fields[part.fieldname] = part.value;
      }
    }
    if (!source && typeof fields.audioUrl === 'string' && fields.audioUrl.trim()) {
      source = { kind: 'url', url: fields.audioUrl.trim() };
    }
  } else if (isRecord(req.body)) {
    Object.assign(fields, req.body);
    if (typeof fields.audioUrl === 'string' && fields.audioUrl.trim()) {
      source = { kind: 'url', url: fields.audioUrl.trim() };
    }
  }

  if (!source) {
    throw new BadRequestError('No audio provided. Upload a file or send audioUrl.');
  }

  return {
    source,
    format: parseNoteFormat(fields.format),
    speakerLabels: parseBoolean(fields.speakerLabels, true),
  };
}

/**
 * Aborts the pipeline when the client goes away before the reply is written.
 */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller;
}

export async function scribeRoutes(server: FastifyInstance, opts: ScribeRouteOptions) {
  const { pipeline } = opts;

  server.post<{ Reply: ScribeResponse }>('/scribe', async (req, reply) => {
    const request = await readScribeRequest(req);
    const controller = abortOnDisconnect(reply);

    const label = request.source.kind === 'bytes'
      ? request.source.filename ?? `${request.source.data.byteLength} bytes`
      : request.source.url;
    console.log(`📥 Scribe request: ${label} | [${request.format}, speaker labels ${request.speakerLabels ? 'on' : 'off'}]`);

    const result = await pipeline.run({ ...request, signal: controller.signal });
    return toScribeResponse(request.format, result);
  });
}
