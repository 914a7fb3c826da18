import chalk from 'chalk';
import { withCommunicator, type SessionCliOptions } from '../common/session.js';

export async function pingCommand(options: SessionCliOptions): Promise<number> {
  return withCommunicator(options, (communicator) => {
    const { healthy, message } = communicator.ping();
    if (healthy) {
      console.log(chalk.green(`✅ ${message}`));
      return 0;
    }
    console.log(chalk.red(`❌ ${message}`));
    return 1;
  });
}
