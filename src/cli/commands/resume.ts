import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { createResearchExecutor } from '../../orchestrator/register-stages';
import { reportCommandError } from '../errors';
import { formatOutcome, formatResumeHint, formatStep } from '../formatters';
import { CLIWorkflowLogger } from '../logger';
import { parseQuery, parseThreadId } from '../validators';

type ResumeCommandOptions = {
  verbose?: boolean;
};

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Answer the clarification question of a suspended thread')
    .argument('<thread>', 'Thread id')
    .argument('<answer>', 'Your answer')
    .option('--verbose', 'Show stage progress and run details')
    .action(async (thread: string, answer: string, options: ResumeCommandOptions) => {
      try {
        const threadId = parseThreadId(thread);
        const verbose = Boolean(options.verbose);
        console.log(formatStep(`Resuming thread ${threadId}`));

        const config = loadConfig();
        const executor = createResearchExecutor({ config, logger: new CLIWorkflowLogger(threadId, verbose) });
        const outcome = await executor.resume(threadId, parseQuery(answer));

        console.log(formatOutcome(outcome, { verbose }));
        if (outcome.status === 'suspended') {
          console.log(formatResumeHint(threadId));
        }
      } catch (err) {
        reportCommandError(err);
      }
    });
}
