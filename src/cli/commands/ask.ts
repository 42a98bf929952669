import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { createResearchExecutor } from '../../orchestrator/register-stages';
import { runConversationTurn } from '../conversation';
import { reportCommandError } from '../errors';
import { formatInfo, formatOutcome, formatResumeHint, formatStageLabel, formatStep } from '../formatters';
import { CLIWorkflowLogger } from '../logger';
import { promptForClarification } from '../prompts';
import { newThreadId, parseQuery, parseThreadId } from '../validators';

export type AskCommandOptions = {
  thread?: string;
  verbose?: boolean;
  interactive?: boolean;
};

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask a research question (starts a new thread unless --thread is given)')
    .argument('<query>', 'Question about a company')
    .option('--thread <id>', 'Continue an existing conversation thread')
    .option('--verbose', 'Show stage progress and run details')
    .option('--no-interactive', 'Print clarification questions instead of prompting for an answer')
    .action(async (query: string, options: AskCommandOptions) => {
      await executeAskCommand(query, options);
    });
}

export async function executeAskCommand(query: string, options: AskCommandOptions): Promise<void> {
  try {
    const text = parseQuery(query);
    const threadId = options.thread ? parseThreadId(options.thread) : newThreadId();
    const verbose = Boolean(options.verbose);
    const interactive = options.interactive !== false && process.stdin.isTTY === true;

    console.log(formatStep(options.thread ? `Continuing thread ${threadId}` : `Starting thread ${threadId}`));

    const config = loadConfig();
    const executor = createResearchExecutor({ config, logger: new CLIWorkflowLogger(threadId, verbose) });
    if (verbose) {
      executor.events.onEvent('stageStarted', (event) => console.log(formatStageLabel(event.stage)));
    }

    const outcome = await runConversationTurn(executor, threadId, text, {
      interactive,
      ask: promptForClarification,
      onOutcome: (turn) => {
        if (turn.status === 'suspended' && interactive) {
          console.log(formatInfo('Clarification needed.'));
        }
      },
    });

    console.log(formatOutcome(outcome, { verbose }));
    if (outcome.status === 'suspended') {
      console.log(formatResumeHint(threadId));
    } else {
      console.log(formatInfo(`Follow up with: research-graph ask --thread ${threadId} "<question>"`));
    }
  } catch (err) {
    reportCommandError(err);
  }
}
