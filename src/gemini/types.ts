import type { AxiosAdapter } from 'axios';
import { z } from 'zod';
import type { WorkflowLogger } from '../orchestrator/logger';

export interface ChatTurn {
  role: 'user' | 'model';
  text: string;
}

export interface GenerateRequest {
  /** Final user turn, sent after `messages` */
  prompt: string;
  system?: string;
  messages?: ChatTurn[];
  temperature?: number;
  /** Ask for `application/json` output */
  json?: boolean;
  /** Attach the Google Search grounding tool */
  groundWithSearch?: boolean;
  /** Overrides the client's default model */
  model?: string;
}

export interface TokenUsage {
  promptTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface GenerateResponse {
  text: string;
  model: string;
  finishReason?: string;
  usage?: TokenUsage;
}

/** What the agents need from a reasoning service */
export interface LanguageModel {
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: WorkflowLogger;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
}

// ── Wire format ─────────────────────────────────────────────────────────

export interface GenerateContentBody {
  contents: Array<{ role: 'user' | 'model'; parts: Array<{ text: string }> }>;
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: { temperature?: number; responseMimeType?: string };
  tools?: Array<{ google_search: Record<string, never> }>;
}

export const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export const ErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});
