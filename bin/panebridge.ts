#!/usr/bin/env node

/**
 * CLI entry point for panebridge
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readFileSync, realpathSync } from 'fs';
import { fileURLToPath, pathToFileURL } from 'url';
import chalk from 'chalk';
import { askCommand } from '../src/cli/commands/ask.js';
import { pendingCommand } from '../src/cli/commands/pending.js';
import { pingCommand } from '../src/cli/commands/ping.js';
import { statusCommand } from '../src/cli/commands/status.js';
import type { ProviderName } from '../src/types/index.js';

const CLI_COMMAND_NAME = 'panebridge';
const PROVIDER_CHOICES = ['codex', 'gemini'] as const;

function resolveCliVersion(): string {
  const candidates = ['../package.json', '../../package.json'].map((relative) =>
    fileURLToPath(new URL(relative, import.meta.url)),
  );

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      // Try next candidate.
    }
  }

  return '0.0.0';
}

function parseProvider(value: unknown): ProviderName {
  return value === 'gemini' ? 'gemini' : 'codex';
}

export interface CliRequest {
  provider: ProviderName;
  question: string[];
  wait: boolean;
  timeout?: number;
  ping: boolean;
  status: boolean;
  pending: boolean;
}

/** Run one parsed request. Returns the process exit code. */
export async function dispatch(request: CliRequest): Promise<number> {
  const { provider } = request;
  if (request.ping) return pingCommand({ provider });
  if (request.status) return statusCommand({ provider });
  if (request.pending) return pendingCommand({ provider });

  if (request.question.length > 0) {
    if (request.timeout !== undefined && (!Number.isInteger(request.timeout) || request.timeout < 0)) {
      console.error(chalk.red('❌ --timeout must be a whole number of seconds (0 waits indefinitely)'));
      return 1;
    }
    return askCommand({ provider, question: request.question, wait: request.wait, timeout: request.timeout });
  }

  console.error(chalk.yellow('Please provide a question or use --ping/--status/--pending'));
  return 1;
}

export async function runCli(rawArgs: string[] = hideBin(process.argv)): Promise<number> {
  let exitCode = 0;

  await yargs(rawArgs)
    .scriptName(CLI_COMMAND_NAME)
    .usage('$0 [ask] <question..> [options]')
    .version(resolveCliVersion())
    .help()
    .strict()
    .command(
      '$0 [question..]',
      'Send a question to the assistant pane, or inspect the session',
      (y) =>
        y
          .positional('question', { type: 'string', array: true, describe: 'Question text (a leading "ask" is ignored)' })
          .option('provider', {
            alias: 'p',
            choices: PROVIDER_CHOICES,
            default: 'codex',
            describe: 'Assistant to talk to',
          })
          .option('wait', { alias: 'w', type: 'boolean', default: false, describe: 'Wait for the reply and print it' })
          .option('timeout', { type: 'number', describe: 'Seconds to wait with --wait (0 waits indefinitely)' })
          .option('ping', { type: 'boolean', default: false, describe: 'Check that the session is alive' })
          .option('status', { type: 'boolean', default: false, describe: 'Show session details' })
          .option('pending', { type: 'boolean', default: false, describe: 'Print the latest reply in the transcript' }),
      async (argv) => {
        exitCode = await dispatch({
          provider: parseProvider(argv.provider),
          question: (argv.question ?? []).map(String),
          wait: argv.wait,
          timeout: argv.timeout,
          ping: argv.ping,
          status: argv.status,
          pending: argv.pending,
        });
      },
    )
    .parseAsync();

  return exitCode;
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  runCli()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(chalk.red('Fatal CLI error:'), error);
      process.exit(1);
    });
}
