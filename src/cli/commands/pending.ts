import chalk from 'chalk';
import { getProviderProfile } from '../../session/providers.js';
import { withCommunicator, type SessionCliOptions } from '../common/session.js';

export async function pendingCommand(options: SessionCliOptions): Promise<number> {
  const name = getProviderProfile(options.provider).displayName;

  return withCommunicator(options, (communicator) => {
    const reply = communicator.consumePending();
    if (reply === null) {
      console.log(chalk.gray(`No ${name} reply available`));
      return 1;
    }
    console.log(reply);
    return 0;
  });
}
