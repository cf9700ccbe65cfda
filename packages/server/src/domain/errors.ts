import axios, { AxiosError } from 'axios';

export class TransportError extends Error {
  constructor(
    public message: string,
    public statusCode?: number,
    public isTransient: boolean = false // true for timeouts/ECONNRESET and 5xx, false for 4xx
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class JobFailedError extends Error {
  constructor(public jobId: string, public detail: string) {
    super(`Transcription job ${jobId} failed: ${detail}`);
    this.name = 'JobFailedError';
  }
}

export class PollTimeoutError extends Error {
  constructor(public jobId: string, public elapsedMs: number) {
    super(`Transcription job ${jobId} did not finish within ${Math.round(elapsedMs / 1000)}s`);
    this.name = 'PollTimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(public jobId?: string) {
    super(jobId ? `Transcription job ${jobId} was cancelled` : 'Request was cancelled');
    this.name = 'CancelledError';
  }
}

interface ServiceErrorBody {
  error?: unknown;
}

/**
 * Translates a raw Axios (or unknown) failure into a TransportError.
 */
export function toTransportError(error: unknown, action: string): TransportError {
  if (error instanceof TransportError) return error;

  if (axios.isAxiosError(error)) {
    const axiosError = error as AxiosError<ServiceErrorBody>;
    const statusCode = axiosError.response?.status;
    const serviceMessage = axiosError.response?.data?.error;
    const msg = typeof serviceMessage === 'string' ? serviceMessage : axiosError.message;

    const isTransient = !statusCode || statusCode >= 500 || ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT'].includes(axiosError.code || '');

    return new TransportError(`${action} failed: ${msg}`, statusCode, isTransient);
  }

  if (error instanceof Error) return new TransportError(`${action} failed: ${error.message}`);
  return new TransportError(`${action} failed: unknown error`);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}
