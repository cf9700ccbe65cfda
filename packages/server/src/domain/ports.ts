import { TranscriptionJob } from '@clinical-scribe/shared';

export interface RequestOptions {
  signal?: AbortSignal;
}

export type PollOutcome =
  | { state: 'completed'; job: TranscriptionJob; checks: number }
  | { state: 'failed'; jobId: string; detail: string; checks: number }
  | { state: 'timed_out'; jobId: string; elapsedMs: number; checks: number }
  | { state: 'cancelled'; jobId: string; checks: number };

export interface ITranscriptionClient {
  /**
   * Sends raw audio bytes to the service and returns the URL it is stored under.
   * Single attempt; fails with TransportError.
   */
  upload(bytes: Uint8Array, options?: RequestOptions): Promise<string>;

  /**
   * Starts a transcription job for an audio URL and returns its id.
   */
  submit(audioUrl: string, speakerLabels: boolean, options?: RequestOptions): Promise<string>;

  /**
   * Waits for the job to reach a terminal state.
   * Throws JobFailedError, PollTimeoutError or CancelledError for the non-completed outcomes.
   */
  poll(jobId: string, options?: RequestOptions): Promise<TranscriptionJob>;
}
