import { z } from 'zod';
import type { WorkflowLogger } from '../orchestrator/logger';

// Field names follow the JSON the prompts ask the model for.

export const ClarityResultSchema = z.object({
  clarity_status: z.enum(['clear', 'needs_clarification']),
  company_name: z.string().nullish(),
  clarification_question: z.string().nullish(),
});

export type ClarityResult = z.infer<typeof ClarityResultSchema>;

export const ConfidenceAssessmentSchema = z.object({
  confidence_score: z.number().min(0).max(10),
  reasoning: z.string(),
});

export type ConfidenceAssessment = z.infer<typeof ConfidenceAssessmentSchema>;

export const ValidationAssessmentSchema = z.object({
  validation_result: z.enum(['sufficient', 'insufficient']),
  critique: z.string(),
  suggestions: z.string().default(''),
});

export type ValidationAssessment = z.infer<typeof ValidationAssessmentSchema>;

export interface AgentOptions {
  /** Model name passed to the client; the client's default when omitted */
  model?: string;
  logger?: WorkflowLogger;
}
