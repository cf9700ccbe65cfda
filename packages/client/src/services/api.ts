import axios, { AxiosInstance, AxiosError } from 'axios';
import fs from 'fs';
import path from 'path';
import FormData from 'form-data';
import http from 'http';
import { configService } from './config';
import {
  ErrorResponse,
  HealthResponse,
  NoteFormat,
  NoteFromTranscriptRequest,
  NoteResponse,
  ScribeResponse,
  ScribeUrlRequest
} from '@clinical-scribe/shared';
import { ApiError, HealthStatus, IApiService, TranscribeOptions } from '../domain';

export class ApiService implements IApiService {
  private _client: AxiosInstance | null = null;

  private get client(): AxiosInstance {
    if (!this._client) {
      const { ip, port, apiKey } = configService.get('server');
      const baseURL = `http://${ip}:${port}`;

      this._client = axios.create({
        baseURL,
        timeout: 10000,
        headers: apiKey ? { 'x-api-key': apiKey } : {},
        httpAgent: new http.Agent({ keepAlive: true }),
        maxContentLength: Infinity,
        maxBodyLength: Infinity
      });
    }
    return this._client;
  }

  // Call this if the user updates their server IP or API key in the Setup menu
  public resetClient(): void {
    this._client = null;
  }

  public async checkHealth(): Promise<HealthStatus> {
    const start = Date.now();
    try {
      const res = await this.client.get<HealthResponse>('/');
      return {
        isOnline: res.status === 200,
        latencyMs: Date.now() - start,
        generation: res.data?.generation
      };
    } catch (error) {
      return { isOnline: false, latencyMs: 0 };
    }
  }

  public async transcribeFile(
    filePath: string,
    options: TranscribeOptions,
    onProgress?: (percentCompleted: number) => void
  ): Promise<ScribeResponse> {
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    const form = new FormData();
    form.append('format', options.format);
    form.append('speakerLabels', String(options.speakerLabels));
    form.append('file', fs.createReadStream(filePath), { filename: path.basename(filePath) });

    try {
      const response = await this.client.post<ScribeResponse>('/scribe', form, {
        headers: form.getHeaders(),
        timeout: 0, // upload plus transcription can take many minutes
        onUploadProgress: (progressEvent) => {
          if (onProgress && progressEvent.total) {
            const percentCompleted = Math.round((progressEvent.loaded * 100) / progressEvent.total);
            onProgress(percentCompleted);
          }
        }
      });

      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  public async transcribeUrl(audioUrl: string, options: TranscribeOptions): Promise<ScribeResponse> {
    const body: ScribeUrlRequest = { audioUrl, ...options };
    try {
      const response = await this.client.post<ScribeResponse>('/scribe', body, { timeout: 0 });
      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  public async generateNote(transcriptText: string, format: NoteFormat): Promise<NoteResponse> {
    const body: NoteFromTranscriptRequest = { transcriptText, format };
    try {
      // Model fallbacks can take a while before the template kicks in
      const response = await this.client.post<NoteResponse>('/notes', body, { timeout: 120000 });
      return response.data;
    } catch (error) {
      throw this.formatError(error);
    }
  }

  // Translates raw Axios errors into our domain ApiError
  private formatError(error: unknown): ApiError | Error {
    if (axios.isAxiosError(error)) {
      const axiosError = error as AxiosError<ErrorResponse>;
      const statusCode = axiosError.response?.status;
      const msg = axiosError.response?.data?.error || axiosError.message;

      // Server unreachable or failing upstream vs. a request the server rejected
      const isTransient = !statusCode || statusCode >= 500 || ['ECONNREFUSED', 'ECONNRESET'].includes(axiosError.code || '');

      return new ApiError(msg, isTransient, statusCode);
    }

    if (error instanceof Error) return error;
    return new Error('Unknown API Error occurred');
  }
}

export const apiService = new ApiService();
