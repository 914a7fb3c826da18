import chalk from 'chalk';
import { describeError } from '../../errors.js';
import { getProviderProfile } from '../../session/providers.js';
import { withCommunicator, type SessionCliOptions } from '../common/session.js';

export type AskCommandOptions = SessionCliOptions & {
  question: string[];
  wait?: boolean;
  /** Seconds; 0 waits indefinitely. Defaults to the provider's configured timeout. */
  timeout?: number;
};

/** Leading `ask` is accepted, so `panebridge ask hi` and `panebridge hi` mean the same. */
export function normalizeQuestion(tokens: string[]): string {
  const rest = tokens.length > 0 && tokens[0].toLowerCase() === 'ask' ? tokens.slice(1) : tokens;
  return rest.join(' ').trim();
}

export async function askCommand(options: AskCommandOptions): Promise<number> {
  const question = normalizeQuestion(options.question);
  if (!question) {
    console.error(chalk.red('❌ Please provide a question'));
    return 1;
  }

  const name = getProviderProfile(options.provider).displayName;

  return withCommunicator(
    {
      ...options,
      output: {
        onWaiting: (elapsedSec) => console.log(chalk.gray(`⏳ Still waiting... (${elapsedSec}s)`)),
      },
    },
    async (communicator) => {
      if (!options.wait) {
        try {
          const { marker } = await communicator.askAsync(question);
          console.log(chalk.green(`✅ Sent to ${name} (marker: ${marker.slice(0, 12)}...)`));
          console.log(chalk.gray('Tip: run with --pending to view the latest reply'));
          return 0;
        } catch (error) {
          console.error(chalk.red(`❌ Send failed: ${describeError(error)}`));
          return 1;
        }
      }

      try {
        console.log(chalk.cyan(`🔔 Sending to ${name}...`));
        if (options.timeout === 0) {
          console.log(chalk.gray(`⏳ Waiting for ${name} reply (no timeout, Ctrl-C to stop)...`));
        } else {
          const timeout = options.timeout ?? getProviderProfile(options.provider).defaultTimeoutSec(communicator.config);
          console.log(chalk.gray(`⏳ Waiting for ${name} reply (timeout ${timeout}s)...`));
        }

        const reply = await communicator.askSync(question, options.timeout);
        if (reply === null) {
          console.log(chalk.yellow(`⏰ No reply from ${name} within the timeout`));
          return 1;
        }
        console.log(chalk.cyan(`🤖 Reply from ${name}:`));
        console.log(reply);
        return 0;
      } catch (error) {
        console.error(chalk.red(`❌ Sync ask failed: ${describeError(error)}`));
        return 1;
      }
    },
  );
}
