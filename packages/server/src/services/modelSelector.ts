import { GoogleGenAI } from '@google/genai';
import { AttemptStage, ModelAttempt } from '@clinical-scribe/shared';
import { describeError } from '../domain/errors';

// Newest / cheapest first
export const BASE_MODEL_NAMES = [
  'gemini-2.5-flash',
  'gemini-2.0-flash',
  'gemini-2.0-flash-lite',
  'gemini-1.5-flash-8b',
  'gemini-1.5-pro',
  'gemini-1.0-pro',
];

const MODEL_NAMESPACE = 'models/';

/**
 * Lists each model under its bare and its namespaced id, since API versions
 * disagree on which spelling they accept.
 */
export function expandModelCandidates(baseNames: readonly string[]): string[] {
  return baseNames.flatMap(name => {
    const bare = name.startsWith(MODEL_NAMESPACE) ? name.slice(MODEL_NAMESPACE.length) : name;
    return [bare, `${MODEL_NAMESPACE}${bare}`];
  });
}

export const DEFAULT_MODEL_CANDIDATES = expandModelCandidates(BASE_MODEL_NAMES);

export interface CascadeFailure<C> {
  candidate: C;
  error: unknown;
}

export type CascadeResult<C, T> =
  | { ok: true; value: T; candidate: C; failures: CascadeFailure<C>[] }
  | { ok: false; failures: CascadeFailure<C>[] };

/**
 * Runs `op` against each candidate in order and stops at the first success.
 * Failures are collected, never thrown.
 */
export async function tryInOrder<C, T>(
  candidates: readonly C[],
  op: (candidate: C) => Promise<T>
): Promise<CascadeResult<C, T>> {
  const failures: CascadeFailure<C>[] = [];

  for (const candidate of candidates) {
    try {
      const value = await op(candidate);
      return { ok: true, value, candidate, failures };
    } catch (error) {
      failures.push({ candidate, error });
    }
  }

  return { ok: false, failures };
}

export interface GenerationBackend {
  /** Cheap viability check, fails when the model id is not usable. */
  probe(model: string): Promise<void>;
  generate(model: string, prompt: string): Promise<string>;
}

export class GeminiBackend implements GenerationBackend {
  private ai: GoogleGenAI;

  constructor(apiKey: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  public async probe(model: string): Promise<void> {
    await this.ai.models.countTokens({ model, contents: '' });
  }

  public async generate(model: string, prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({ model, contents: prompt });
    return response.text ?? '';
  }
}

class ModelUnavailableError extends Error {
  constructor(public stage: AttemptStage, public reason: string) {
    super(`${stage}: ${reason}`);
    this.name = 'ModelUnavailableError';
  }
}

async function runStage<T>(stage: AttemptStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new ModelUnavailableError(stage, describeError(error));
  }
}

function toAttempt(failure: CascadeFailure<string>): ModelAttempt {
  const { candidate, error } = failure;
  if (error instanceof ModelUnavailableError) {
    return { model: candidate, stage: error.stage, reason: error.reason };
  }
  return { model: candidate, stage: 'generate', reason: describeError(error) };
}

export interface GenerationOutcome {
  text: string; // empty when every candidate failed or no backend is configured
  model?: string;
  attempts: ModelAttempt[];
}

export class ModelFallbackSelector {
  constructor(
    private readonly backend: GenerationBackend | null,
    private readonly candidates: readonly string[] = DEFAULT_MODEL_CANDIDATES
  ) {}

  public get isConfigured(): boolean {
    return this.backend !== null;
  }

  public async generate(prompt: string): Promise<GenerationOutcome> {
    const backend = this.backend;
    if (!backend) return { text: '', attempts: [] };

    const result = await tryInOrder(this.candidates, async (model) => {
      await runStage('probe', () => backend.probe(model));
      const text = await runStage('generate', () => backend.generate(model, prompt));
      if (!text.trim()) throw new ModelUnavailableError('generate', 'empty response');
      return text;
    });

    const attempts = result.failures.map(toAttempt);
    for (const attempt of attempts) {
      console.log(`   ↪️  ${attempt.model} unavailable (${attempt.stage}): ${attempt.reason}`);
    }

    if (!result.ok) {
      console.warn(`⚠️ No generation model succeeded after ${attempts.length} attempt(s).`);
      return { text: '', attempts };
    }

    console.log(`✅ Note generated with ${result.candidate}`);
    return { text: result.value, model: result.candidate, attempts };
  }
}

export function createModelSelector(apiKey: string | undefined, models?: readonly string[]): ModelFallbackSelector {
  if (!apiKey) {
    console.warn('⚠️ GEMINI_API_KEY is missing. Notes will use the template fallback.');
    return new ModelFallbackSelector(null);
  }
  const candidates = models && models.length > 0 ? expandModelCandidates(models) : DEFAULT_MODEL_CANDIDATES;
  return new ModelFallbackSelector(new GeminiBackend(apiKey), candidates);
}
