import OpenAI from 'openai';
import { z } from 'zod';
import { SYSTEM_PROMPT } from './prompt.js';
import { clamp } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { AIResult, AiOracle, AppConfig } from '../types.js';

export interface ChatRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/** Minimal chat-completion seam so the oracle can run against a fake in tests */
export interface ChatTransport {
  complete(request: ChatRequest, signal: AbortSignal): Promise<string | null>;
}

export class AiResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AiResponseError';
  }
}

const stringList = z.array(z.string()).catch([]);

// numbers or numeric strings only; null, '' and booleans would coerce to 0
const scoreValue = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

const aiResponseSchema = z.object({
  ai_score: scoreValue,
  risk_assessment: z
    .preprocess((v) => (typeof v === 'string' ? v.toLowerCase() : v), z.enum(['low', 'medium', 'high', 'critical']))
    .catch('medium'),
  recommendation: z
    .preprocess((v) => (typeof v === 'string' ? v.toUpperCase() : v), z.enum(['BUY', 'CONSIDER', 'HOLD', 'CAUTION', 'AVOID']))
    .catch('HOLD'),
  confidence: scoreValue.catch(50),
  reasoning: z.string().catch(''),
  key_insights: stringList,
  risk_factors: stringList,
  stop_flags: stringList,
});

/** Validates raw model output; anything that is not a scored JSON object is rejected */
export function parseAiResponse(content: string | null, model: string, latencyMs: number): AIResult {
  if (content === null || content.trim() === '') {
    throw new AiResponseError('LLM returned an empty response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new AiResponseError('LLM response is not valid JSON');
  }

  const parsed = aiResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AiResponseError(`LLM response failed validation: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }

  const data = parsed.data;
  return {
    aiScore: clamp(data.ai_score, 0, 100),
    riskAssessment: data.risk_assessment,
    recommendation: data.recommendation,
    confidence: clamp(data.confidence, 0, 100),
    reasoning: data.reasoning,
    keyInsights: data.key_insights,
    riskFactors: data.risk_factors,
    stopFlags: data.stop_flags,
    model,
    latencyMs,
  };
}

export class OpenAiTransport implements ChatTransport {
  constructor(private readonly client: OpenAI) {}

  async complete(request: ChatRequest, signal: AbortSignal): Promise<string | null> {
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal },
    );
    return completion.choices[0]?.message?.content ?? null;
  }
}

export interface LlmOracleOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Single-shot LLM scoring. Never retries: the caller owns the timeout
 * and treats any rejection as "AI unavailable".
 */
export class LlmOracle implements AiOracle {
  constructor(
    private readonly transport: ChatTransport,
    private readonly options: LlmOracleOptions,
  ) {}

  async infer(prompt: string, signal: AbortSignal): Promise<AIResult> {
    const start = Date.now();
    const content = await this.transport.complete(
      {
        model: this.options.model,
        system: SYSTEM_PROMPT,
        user: prompt,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      },
      signal,
    );
    const result = parseAiResponse(content, this.options.model, Date.now() - start);
    logger.info(`[ai] ${this.options.model} scored ${result.aiScore} (${result.recommendation}) in ${result.latencyMs}ms`);
    return result;
  }
}

/** Builds the oracle from config, or null when AI enrichment is off */
export function createLlmOracle(config: AppConfig['ai']): LlmOracle | null {
  if (!config.enabled || !config.apiKey) return null;
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
    timeout: config.timeoutMs,
  });
  return new LlmOracle(new OpenAiTransport(client), {
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
}
