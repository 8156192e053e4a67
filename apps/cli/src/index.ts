#!/usr/bin/env -S npx tsx
import prompts from 'prompts';
import { formatProgress, type LoadStatus, type MessageSummary } from '@mbox-search/shared';
import { MboxWorkspace, setLogLevel } from '@mbox-search/mbox-core';
import {
  formatMessage,
  formatResultsTable,
  HELP_TEXT,
  isMenuAction,
  MENU_CHOICES,
  parseArgs,
  type CliOptions,
} from './render';

const loadArchive = async (workspace: MboxWorkspace, options: CliOptions): Promise<LoadStatus> => {
  const session = await workspace.beginLoad(options.filePath, {
    strictBoundaries: options.strictBoundaries,
  });

  session.subscribe((event) => {
    if (event.type === 'progress') {
      process.stdout.write(`\rLoading ${formatProgress(event.progress)}   `);
    }
  });

  // Ctrl+C during the load stops it; the messages read so far stay searchable
  const onInterrupt = () => {
    void session.cancel();
  };
  process.once('SIGINT', onInterrupt);
  const status = await session.done;
  process.off('SIGINT', onInterrupt);
  process.stdout.write('\n');
  return status;
};

const promptQuery = async (): Promise<string | null> => {
  const response = await prompts({ type: 'text', name: 'query', message: 'Enter search query' });
  const query: unknown = response.query;
  return typeof query === 'string' ? query : null;
};

const promptResultNumber = async (count: number): Promise<number | null> => {
  const response = await prompts({
    type: 'number',
    name: 'number',
    message: `Result number (1-${count})`,
    min: 1,
    max: count,
  });
  const value: unknown = response.number;
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
};

const runMenu = async (workspace: MboxWorkspace, options: CliOptions): Promise<void> => {
  let lastResults: MessageSummary[] = [];

  for (;;) {
    console.log('\nMBox Search Tool');
    const response = await prompts({
      type: 'select',
      name: 'action',
      message: 'Choose an action',
      choices: MENU_CHOICES,
    });
    const action: unknown = response.action;
    // Ctrl+C or Esc at the menu ends the session
    if (!isMenuAction(action) || action === 'exit') return;

    if (action === 'open') {
      if (lastResults.length === 0) {
        console.log('Run a search first.');
        continue;
      }
      const number = await promptResultNumber(lastResults.length);
      if (number === null) continue;
      const detail = await workspace.getBody(lastResults[number - 1]);
      console.log(`\n${formatMessage(detail)}`);
      continue;
    }

    const query = await promptQuery();
    if (query === null) return;
    if (!query) {
      console.log('Empty query. Please try again.');
      continue;
    }

    lastResults = await workspace.search(query, action, options.caseSensitive);
    console.log(`\n${formatResultsTable(lastResults)}`);
  }
};

const main = async (): Promise<void> => {
  setLogLevel(process.env.LOG_LEVEL ?? 'warn');

  try {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
      console.log(HELP_TEXT);
      return;
    }

    const workspace = new MboxWorkspace();
    const status = await loadArchive(workspace, options);

    if (status.state === 'failed') {
      console.error(`Error loading mbox file: ${status.error?.message ?? 'unknown error'}`);
      process.exitCode = 1;
      return;
    }
    if (status.state === 'cancelled') {
      console.log(`Load cancelled. Searching the ${status.progress.messageCount} messages read so far.`);
    } else {
      console.log(`Successfully loaded ${status.progress.messageCount} messages`);
    }

    await runMenu(workspace, options);
    await workspace.closeSession(status.sessionId);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  }
};

void main();
