import axios, { AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import { parseTranscriptStatus, TranscriptionJob, TranscriptStatus } from '@clinical-scribe/shared';
import { CancelledError, JobFailedError, PollTimeoutError, toTransportError, TransportError } from '../domain/errors';
import { ITranscriptionClient, PollOutcome, RequestOptions } from '../domain/ports';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS, DEFAULT_TRANSCRIPTION_URL } from '../config/env';
import { isRecord } from '../utils/helper';

export interface TranscriptionClientOptions {
  apiKey: string;
  baseURL?: string;
  pollIntervalMs?: number;
  pollTimeoutMs?: number; // 0 waits forever
  requestTimeoutMs?: number;
}

interface SubmitPayload {
  audio_url: string;
  speaker_labels: boolean;
  format_text: boolean;
  punctuate: boolean;
  speech_model: string;
  language_detection: boolean;
}

/**
 * Maps the service's transcript payload onto a TranscriptionJob.
 * Unknown statuses are read as still processing.
 */
export function normalizeJob(jobId: string, body: unknown): TranscriptionJob {
  const raw = isRecord(body) ? body : {};
  const status = parseTranscriptStatus(raw.status);

  const job: TranscriptionJob = {
    id: typeof raw.id === 'string' && raw.id ? raw.id : jobId,
    status,
  };

  if (typeof raw.text === 'string') job.fullText = raw.text;
  if (Array.isArray(raw.utterances)) job.utterances = raw.utterances;
  if (typeof raw.language_code === 'string') job.languageCode = raw.language_code;
  if (typeof raw.audio_duration === 'number' && Number.isFinite(raw.audio_duration)) {
    job.audioDurationSeconds = raw.audio_duration;
  }
  if (status === 'error') {
    job.errorDetail = typeof raw.error === 'string' && raw.error ? raw.error : 'Transcription failed';
  }

  return job;
}

export class TranscriptionClient implements ITranscriptionClient {
  private _client: AxiosInstance | null = null;
  private readonly pollIntervalMs: number;
  private readonly pollTimeoutMs: number;

  constructor(private readonly options: TranscriptionClientOptions) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  }

  private get client(): AxiosInstance {
    if (!this._client) {
      this._client = axios.create({
        baseURL: this.options.baseURL ?? DEFAULT_TRANSCRIPTION_URL,
        timeout: this.options.requestTimeoutMs ?? 30000,
        headers: { authorization: this.options.apiKey },
        maxContentLength: Infinity,
        maxBodyLength: Infinity
      });
    }
    return this._client;
  }

  public async upload(bytes: Uint8Array, options: RequestOptions = {}): Promise<string> {
    console.log(`📤 Uploading ${bytes.byteLength} bytes of audio...`);
    // axios posts a non-Buffer view's whole backing ArrayBuffer
    const body = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    try {
      const response = await this.client.post<unknown>('/upload', body, {
        headers: { 'content-type': 'application/octet-stream' },
        timeout: 0, // large recordings take as long as they take
        signal: options.signal
      });

      const uploadUrl = isRecord(response.data) ? response.data.upload_url : undefined;
      if (typeof uploadUrl !== 'string' || !uploadUrl) {
        throw new TransportError('Upload failed: response did not include upload_url', response.status);
      }
      return uploadUrl;
    } catch (error) {
      if (options.signal?.aborted) throw new CancelledError();
      throw toTransportError(error, 'Upload');
    }
  }

  public async submit(audioUrl: string, speakerLabels: boolean, options: RequestOptions = {}): Promise<string> {
    const payload: SubmitPayload = {
      audio_url: audioUrl,
      speaker_labels: speakerLabels,
      format_text: true,
      punctuate: true,
      speech_model: 'universal',
      language_detection: true
    };

    try {
      const response = await this.client.post<unknown>('/transcript', payload, {
        headers: { 'content-type': 'application/json' },
        signal: options.signal
      });

      const body = response.data;
      const id = isRecord(body) ? body.id : undefined;
      if (typeof id !== 'string' || !id) {
        throw new TransportError('Submit failed: response did not include a job id', response.status);
      }
      console.log(`📝 Transcription job submitted: ${id} (speaker labels: ${speakerLabels ? 'on' : 'off'})`);
      return id;
    } catch (error) {
      if (options.signal?.aborted) throw new CancelledError();
      throw toTransportError(error, 'Submit');
    }
  }

  public async fetchJob(jobId: string, options: RequestOptions = {}): Promise<TranscriptionJob> {
    try {
      const response = await this.client.get<unknown>(`/transcript/${encodeURIComponent(jobId)}`, {
        signal: options.signal
      });
      return normalizeJob(jobId, response.data);
    } catch (error) {
      throw toTransportError(error, 'Poll');
    }
  }

  /**
   * Polls until the job is terminal, the deadline passes or the signal fires.
   * Transport failures are thrown rather than folded into the outcome.
   */
  public async watch(jobId: string, options: RequestOptions = {}): Promise<PollOutcome> {
    const { signal } = options;
    const started = Date.now();
    let checks = 0;
    let lastStatus: TranscriptStatus | undefined;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      if (signal?.aborted) return { state: 'cancelled', jobId, checks };

      let job: TranscriptionJob;
      try {
        job = await this.fetchJob(jobId, options);
      } catch (error) {
        if (signal?.aborted) return { state: 'cancelled', jobId, checks };
        throw error;
      }
      checks++;

      if (job.status !== lastStatus) {
        console.log(`   [Job ${jobId}] Current Status: [ ${job.status} ]`);
        lastStatus = job.status;
      }

      if (job.status === 'completed') return { state: 'completed', job, checks };
      if (job.status === 'error') {
        return { state: 'failed', jobId, detail: job.errorDetail ?? 'Transcription failed', checks };
      }

      const elapsedMs = Date.now() - started;
      if (this.pollTimeoutMs > 0 && elapsedMs >= this.pollTimeoutMs) {
        return { state: 'timed_out', jobId, elapsedMs, checks };
      }

      const waitMs = this.pollTimeoutMs > 0
        ? Math.min(this.pollIntervalMs, this.pollTimeoutMs - elapsedMs)
        : this.pollIntervalMs;

      try {
        await sleep(waitMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) return { state: 'cancelled', jobId, checks };
        throw error;
      }
    }
  }

  public async poll(jobId: string, options: RequestOptions = {}): Promise<TranscriptionJob> {
    const outcome = await this.watch(jobId, options);

    switch (outcome.state) {
      case 'completed':
        return outcome.job;
      case 'failed':
        throw new JobFailedError(jobId, outcome.detail);
      case 'timed_out':
        throw new PollTimeoutError(jobId, outcome.elapsedMs);
      case 'cancelled':
        throw new CancelledError(jobId);
    }
  }
}
