import axios from 'axios';
import type { AxiosError, AxiosInstance } from 'axios';
import { GeminiAuthenticationError, GeminiEmptyResponseError, GeminiError, GeminiRateLimitError } from './errors';
import { RetryPolicy } from './retry';
import { ErrorBodySchema, GenerateContentResponseSchema } from './types';
import type { GenerateContentBody, GeminiClientOptions, GenerateRequest, GenerateResponse, LanguageModel } from './types';
import type { WorkflowLogger } from '../orchestrator/logger';

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export class GeminiClient implements LanguageModel {
  private axiosInstance: AxiosInstance;
  private retry: RetryPolicy;
  private logger?: WorkflowLogger;
  readonly model: string;

  constructor(options: GeminiClientOptions) {
    this.model = options.model;
    this.logger = options.logger;
    this.retry = new RetryPolicy(options.maxRetries ?? 2, options.retryBaseDelayMs ?? 1000);
    this.axiosInstance = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
      timeout: options.timeout ?? 60000,
      headers: {
        'x-goog-api-key': options.apiKey,
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    this.axiosInstance.interceptors.request.use((config) => {
      this.logger?.debug(`[Gemini API] ${config.method?.toUpperCase() ?? 'POST'} ${config.url ?? ''}`);
      return config;
    });

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        const response = error.response;
        if (!response) throw new GeminiError(`Network Error: ${error.message}`, 0, error);

        const body = ErrorBodySchema.safeParse(response.data);
        const message = body.success ? body.data.error.message : response.statusText || `HTTP ${response.status}`;

        // Map HTTP errors to typed errors
        switch (response.status) {
          case 401:
          case 403:
            throw new GeminiAuthenticationError(message, response.status);
          case 429:
            throw new GeminiRateLimitError(RetryPolicy.getRetryAfter(response), message);
          default:
            throw new GeminiError(message, response.status, error);
        }
      },
    );
  }

  /**
   * One generateContent call. Transient failures are retried with backoff;
   * an answer without text raises GeminiEmptyResponseError.
   */
  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const model = request.model ?? this.model;
    const body = buildRequestBody(request);

    return this.retry.run(
      async () => {
        const { data } = await this.axiosInstance.post<unknown>(`/models/${encodeURIComponent(model)}:generateContent`, body);
        return parseResponse(model, data);
      },
      (error, attempt, delayMs) => {
        this.logger?.warn(`Gemini request failed, retrying in ${delayMs}ms`, { model, attempt, error: error instanceof Error ? error.message : String(error) });
      },
    );
  }
}

export function buildRequestBody(request: GenerateRequest): GenerateContentBody {
  const body: GenerateContentBody = {
    contents: [...(request.messages ?? []), { role: 'user' as const, text: request.prompt }].map((turn) => ({ role: turn.role, parts: [{ text: turn.text }] })),
    generationConfig: {},
  };

  if (request.system) {
    body.systemInstruction = { parts: [{ text: request.system }] };
  }
  if (request.temperature !== undefined) {
    body.generationConfig.temperature = request.temperature;
  }
  if (request.json) {
    body.generationConfig.responseMimeType = 'application/json';
  }
  if (request.groundWithSearch) {
    body.tools = [{ google_search: {} }];
  }
  return body;
}

export function parseResponse(model: string, data: unknown): GenerateResponse {
  const result = GenerateContentResponseSchema.safeParse(data);
  if (!result.success) {
    throw new GeminiError(`Unexpected response shape from ${model}`, 200, result.error);
  }

  const candidate = result.data.candidates?.[0];
  const text = (candidate?.content?.parts ?? [])
    .map((part) => part.text ?? '')
    .join('')
    .trim();
  if (!text) {
    throw new GeminiEmptyResponseError(model, candidate?.finishReason);
  }

  const usage = result.data.usageMetadata;
  return {
    text,
    model: result.data.modelVersion ?? model,
    finishReason: candidate?.finishReason,
    usage: usage
      ? {
          promptTokens: usage.promptTokenCount,
          outputTokens: usage.candidatesTokenCount,
          totalTokens: usage.totalTokenCount,
        }
      : undefined,
  };
}
