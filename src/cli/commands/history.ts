import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { ConsoleWorkflowLogger } from '../../orchestrator/logger';
import { createCheckpointStore } from '../../orchestrator/register-stages';
import { reportCommandError } from '../errors';
import { formatInfo, formatSuccess, formatThreadSummary } from '../formatters';
import { parseLimit } from '../validators';

type HistoryCommandOptions = {
  limit?: string;
  json?: boolean;
};

export const DEFAULT_HISTORY_LIMIT = 20;

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List stored threads, most recently updated first')
    .option('--limit <n>', `Maximum number of threads (default: ${DEFAULT_HISTORY_LIMIT})`)
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const limit = parseLimit(options.limit, DEFAULT_HISTORY_LIMIT);
        const config = loadConfig();
        const store = createCheckpointStore(config, process.cwd(), new ConsoleWorkflowLogger({ level: config.logging.level }));
        const entries = (await store.list()).slice(0, limit);

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }

        if (!entries.length) {
          console.log(formatInfo('No threads found.'));
          return;
        }

        console.log(formatSuccess(`${entries.length} thread(s)`));
        for (const entry of entries) console.log(formatThreadSummary(entry));
      } catch (err) {
        reportCommandError(err);
      }
    });
}
