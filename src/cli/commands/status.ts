import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { CheckpointStore, StoredCheckpoint } from '../../orchestrator/checkpoint-store';
import { ConsoleWorkflowLogger } from '../../orchestrator/logger';
import { createCheckpointStore } from '../../orchestrator/register-stages';
import { reportCommandError } from '../errors';
import { formatCheckpoint, formatInfo, formatSuccess } from '../formatters';
import { parseThreadId } from '../validators';

type StatusCommandOptions = {
  thread?: string;
  json?: boolean;
};

/** The named thread, or the most recently updated one */
export async function resolveCheckpoint(store: CheckpointStore, threadId?: string): Promise<StoredCheckpoint | null> {
  if (threadId) {
    return store.load(threadId);
  }
  const [latest] = await store.list();
  return latest ? store.load(latest.threadId) : null;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the checkpoint of a thread (latest when omitted)')
    .option('--thread <id>', 'Show status for a specific thread')
    .option('--json', 'Output the checkpoint as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const threadId = options.thread ? parseThreadId(options.thread) : undefined;
        const config = loadConfig();
        const store = createCheckpointStore(config, process.cwd(), new ConsoleWorkflowLogger({ level: config.logging.level }));
        const checkpoint = await resolveCheckpoint(store, threadId);

        if (!checkpoint) {
          console.log(formatInfo(threadId ? `No checkpoint found for thread: ${threadId}` : 'No threads found.'));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(checkpoint, null, 2));
          return;
        }

        console.log(formatSuccess('Thread status'));
        for (const line of formatCheckpoint(checkpoint)) console.log(line);
      } catch (err) {
        reportCommandError(err);
      }
    });
}
