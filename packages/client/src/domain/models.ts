import { NoteFormat } from '@clinical-scribe/shared';

export class ApiError extends Error {
    constructor(
        public message: string,
        public isTransient: boolean, // true when the server is unreachable or answered 5xx
        public statusCode?: number
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export interface HealthStatus {
    isOnline: boolean;
    latencyMs: number;
    generation?: boolean; // whether the server has a model key; notes fall back to templates otherwise
}

export interface TranscribeOptions {
    format: NoteFormat;
    speakerLabels: boolean;
}

export interface ExportedNote {
    markdownPath: string;
    textPath: string;
}
