import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import fs from 'fs';
import { NoteFormat } from '@clinical-scribe/shared';
import { ApiService } from '../../src/services/api';
import { configService } from '../../src/services/config';
import { ApiError } from '../../src/domain';

// 1. Mock External Dependencies
vi.mock('axios');
vi.mock('fs');
vi.mock('../../src/services/config', () => ({
  configService: {
    get: vi.fn()
  }
}));

describe('ApiService', () => {
  let api: ApiService;
  let mockAxiosInstance: any;

  beforeEach(() => {
    vi.clearAllMocks();

    vi.mocked(configService.get).mockImplementation((key: any): any => {
      if (key === 'server') return { ip: '127.0.0.1', port: 3000, apiKey: 'test-key' };
      return {};
    });

    mockAxiosInstance = {
      get: vi.fn(),
      post: vi.fn()
    };
    vi.mocked(axios.create).mockReturnValue(mockAxiosInstance);
    vi.mocked(axios.isAxiosError).mockReturnValue(true);

    api = new ApiService();
  });

  describe('checkHealth()', () => {
    it('reports the server as online with its generation flag', async () => {
      mockAxiosInstance.get.mockResolvedValueOnce({
        status: 200,
        data: { status: 'online', service: 'Clinical Scribe Server', generation: true }
      });

      const result = await api.checkHealth();

      expect(result.isOnline).toBe(true);
      expect(result.generation).toBe(true);
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
      expect(mockAxiosInstance.get).toHaveBeenCalledWith('/');
      expect(axios.create).toHaveBeenCalledWith(expect.objectContaining({
        baseURL: 'http://127.0.0.1:3000',
        headers: { 'x-api-key': 'test-key' }
      }));
    });

    it('reports the server as offline when it is unreachable', async () => {
      mockAxiosInstance.get.mockRejectedValueOnce(new Error('Network Error'));

      expect(await api.checkHealth()).toEqual({ isOnline: false, latencyMs: 0 });
    });
  });

  describe('transcribeFile()', () => {
    it('throws before any request when the file is missing', async () => {
      vi.mocked(fs.existsSync).mockReturnValue(false);

      await expect(api.transcribeFile('/recordings/missing.wav', { format: NoteFormat.SOAP, speakerLabels: true }))
        .rejects.toThrow('File not found: /recordings/missing.wav');
      expect(mockAxiosInstance.post).not.toHaveBeenCalled();
    });

    it('posts the recording as multipart and reports upload progress', async () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.createReadStream).mockReturnValue('fake-stream' as any);
      const onProgress = vi.fn();
      mockAxiosInstance.post.mockImplementationOnce(async (_url: string, _form: unknown, config: any) => {
        config.onUploadProgress({ loaded: 50, total: 200 });
        return { data: { jobId: 'job-1' } };
      });

      const result = await api.transcribeFile('/recordings/visit.wav', { format: NoteFormat.HP, speakerLabels: false }, onProgress);

      expect(result).toEqual({ jobId: 'job-1' });
      expect(fs.createReadStream).toHaveBeenCalledWith('/recordings/visit.wav');
      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/scribe', expect.anything(), expect.objectContaining({ timeout: 0 }));
      expect(onProgress).toHaveBeenCalledWith(25);
    });
  });

  describe('transcribeUrl()', () => {
    it('sends the URL and options as JSON', async () => {
      mockAxiosInstance.post.mockResolvedValueOnce({ data: { jobId: 'job-2' } });

      await api.transcribeUrl('https://cdn.test/visit.mp3', { format: NoteFormat.SOAP, speakerLabels: true });

      expect(mockAxiosInstance.post).toHaveBeenCalledWith(
        '/scribe',
        { audioUrl: 'https://cdn.test/visit.mp3', format: 'SOAP', speakerLabels: true },
        { timeout: 0 }
      );
    });

    it('turns a rejected job into a non-transient ApiError', async () => {
      mockAxiosInstance.post.mockRejectedValueOnce({
        message: 'Request failed with status code 422',
        response: { status: 422, data: { error: 'Transcription job job-2 failed: Audio file is corrupt' } }
      });

      const error = await api.transcribeUrl('https://cdn.test/visit.mp3', { format: NoteFormat.SOAP, speakerLabels: true })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({
        message: 'Transcription job job-2 failed: Audio file is corrupt',
        statusCode: 422,
        isTransient: false
      });
    });
  });

  describe('generateNote()', () => {
    it('posts the transcript and returns the note', async () => {
      const note = { format: 'HP', noteText: 'HISTORY & PHYSICAL (H&P)', markdown: '# HISTORY & PHYSICAL (H&P)', producingModel: 'm1' };
      mockAxiosInstance.post.mockResolvedValueOnce({ data: note });

      const result = await api.generateNote('Chest pain.', NoteFormat.HP);

      expect(result).toEqual(note);
      expect(mockAxiosInstance.post).toHaveBeenCalledWith('/notes', { transcriptText: 'Chest pain.', format: 'HP' }, expect.anything());
    });

    it('marks a refused connection as transient', async () => {
      mockAxiosInstance.post.mockRejectedValueOnce({ message: 'connect ECONNREFUSED 127.0.0.1:3000', code: 'ECONNREFUSED' });

      await expect(api.generateNote('Chest pain.', NoteFormat.HP)).rejects.toMatchObject({
        message: 'connect ECONNREFUSED 127.0.0.1:3000',
        isTransient: true,
        statusCode: undefined
      });
    });
  });
});
