import chalk from 'chalk';
import { Command } from 'commander';
import { loadSyncConfig, SyncConfig } from '@/lib/config/env-validation';
import { DESTINATION_NAMES, parseDestinationName } from '@/lib/config/destinations';
import { createDestinationRouter, DestinationRouter } from '@/lib/services/destination-router';
import { ConfigurationError, SyncError, UsageError } from '@/lib/errors';
import { version } from '@/package.json';

export interface SyncCommandDeps {
  loadConfig: () => SyncConfig;
  createRouter: (config: SyncConfig) => DestinationRouter;
}

const defaultDeps: SyncCommandDeps = {
  loadConfig: () => loadSyncConfig(),
  createRouter: createDestinationRouter,
};

function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message}`;
  }
  if (error instanceof SyncError) {
    return `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one destination, or all of them when none is named. Resolves to the process exit code.
 */
export async function syncCommand(destination: string | undefined, deps: SyncCommandDeps = defaultDeps): Promise<number> {
  try {
    // Reject unknown names before touching config or the network
    if (destination !== undefined) {
      parseDestinationName(destination);
    }

    const router = deps.createRouter(deps.loadConfig());
    const results = await router.run(destination);

    console.log('');
    for (const result of results) {
      console.log(
        `${chalk.green('●')} ${chalk.bold(result.destination)} ${chalk.gray(result.range)}: ` +
          `${result.rows} rows from ${result.fetched} calls, ${result.updatedCells} cells updated`
      );
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(error.message));
      return 1;
    }
    console.error(chalk.red(`❌ Sync failed: ${describeError(error)}`));
    return 1;
  }
}

export function createSyncCommand(deps: SyncCommandDeps = defaultDeps): Command {
  return new Command('sync-calls')
    .description('Sync Vapi call logs into Google Sheets')
    .version(version)
    .argument('[destination]', `Destination to sync (${DESTINATION_NAMES.join(' | ')}); all when omitted`)
    .allowExcessArguments(false)
    .action(async (destination: string | undefined) => {
      process.exitCode = await syncCommand(destination, deps);
    });
}
