import chalk from 'chalk';
import type { CheckpointSummary, StoredCheckpoint } from '../orchestrator/checkpoint-store';
import type { RunOutcome } from '../orchestrator/executor';
import type { ResearchStage, ThreadState } from '../orchestrator/thread-state';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Stage progress ──────────────────────────────────────────────────────

const STAGE_LABELS: Record<ResearchStage, string> = {
  resolve: 'Resolving the question...',
  'await-input': 'Waiting for clarification',
  gather: 'Researching...',
  validate: 'Validating findings...',
  compose: 'Writing the answer...',
};

export function formatStageLabel(stage: string): string {
  const label = isResearchStage(stage) ? STAGE_LABELS[stage] : stage;
  return chalk.cyan(`  [${stage}] ${label}`);
}

function isResearchStage(stage: string): stage is ResearchStage {
  return Object.prototype.hasOwnProperty.call(STAGE_LABELS, stage);
}

// ── Turn result ─────────────────────────────────────────────────────────

export function formatResumeHint(threadId: string): string {
  return formatInfo(`Answer with: research-graph resume ${threadId} "<your answer>"`);
}

export function formatOutcome(outcome: RunOutcome<ThreadState, ResearchStage>, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (outcome.status === 'suspended') {
    lines.push(chalk.yellow.bold('Clarification needed.'));
    lines.push(formatWarning(String(outcome.payload)));
  } else {
    lines.push(chalk.green.bold('Answer'));
    lines.push(outcome.state.finalResponse ?? '');
  }

  if (opts?.verbose) {
    lines.push('');
    lines.push(formatInfo(`Thread:    ${outcome.threadId}`));
    lines.push(formatInfo(`Stages:    ${outcome.state.visitedTrace.join(' -> ')}`));
    lines.push(formatInfo(`Steps:     ${outcome.steps}`));
    if (outcome.state.confidenceScore !== undefined) {
      lines.push(formatInfo(`Confidence: ${outcome.state.confidenceScore.toFixed(1)}/10`));
    }
    lines.push(formatInfo(`Attempts:  ${outcome.state.attemptCounter}`));
    lines.push(formatInfo(`Duration:  ${(outcome.durationMs / 1000).toFixed(1)}s`));
  }

  return lines.join('\n');
}

// ── Stored threads ──────────────────────────────────────────────────────

export function formatThreadSummary(summary: CheckpointSummary): string {
  const status = summary.suspended ? chalk.yellow('suspended') : chalk.green('settled');
  return `  ${summary.threadId}  ${status}  v${summary.version}  ${summary.lastStage ?? '-'}  ${summary.updatedAt}`;
}

/** Field view of a checkpoint; the state is shown as stored. */
export function formatCheckpoint(checkpoint: StoredCheckpoint): string[] {
  const state = checkpoint.state;
  const lines = [
    formatInfo(`thread:    ${checkpoint.threadId}`),
    formatInfo(`status:    ${checkpoint.pendingResume ? 'suspended' : 'settled'}`),
    formatInfo(`version:   ${checkpoint.version}`),
    formatInfo(`lastStage: ${checkpoint.lastStage ?? '-'}`),
    formatInfo(`updatedAt: ${checkpoint.updatedAt}`),
  ];

  if (typeof state.lastResolvedSubject === 'string') {
    lines.push(formatInfo(`subject:   ${state.lastResolvedSubject}`));
  }
  if (Array.isArray(state.messageHistory)) {
    lines.push(formatInfo(`messages:  ${state.messageHistory.length}`));
  }
  if (checkpoint.pendingResume) {
    lines.push(formatWarning(`waiting:   ${String(checkpoint.pendingResume.payload)}`));
  }
  return lines;
}
