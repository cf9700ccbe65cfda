export interface ServerConfig {
  transcription: {
    apiKey?: string;
    baseURL: string;
    pollIntervalMs: number;
    pollTimeoutMs: number; // 0 disables the deadline
  };
  generation: {
    apiKey?: string;
    models?: string[];
  };
  port: number;
  host: string;
  apiKey?: string; // static credential for incoming requests
}

export const DEFAULT_TRANSCRIPTION_URL = 'https://api.assemblyai.com/v2';
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_POLL_TIMEOUT_MS = 15 * 60 * 1000;

type Env = Record<string, string | undefined>;

function firstSet(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    transcription: {
      // Older .env files used the misspelled / lowercase names
      apiKey: firstSet(env, 'ASSEMBLYAI_API_KEY', 'assemblyai_api_key', 'Assemby_api_key'),
      baseURL: firstSet(env, 'ASSEMBLYAI_BASE_URL') ?? DEFAULT_TRANSCRIPTION_URL,
      pollIntervalMs: parseNonNegativeInt(env.POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
      pollTimeoutMs: parseNonNegativeInt(env.POLL_TIMEOUT_MS, DEFAULT_POLL_TIMEOUT_MS),
    },
    generation: {
      apiKey: firstSet(env, 'GEMINI_API_KEY', 'gemini_api_key'),
      models: parseList(env.GEMINI_MODELS),
    },
    port: parseNonNegativeInt(env.PORT, 3000),
    host: firstSet(env, 'HOST') ?? '127.0.0.1',
    apiKey: firstSet(env, 'API_KEY'),
  };
}
