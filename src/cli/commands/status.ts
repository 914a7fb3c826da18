import chalk from 'chalk';
import { getProviderProfile } from '../../session/providers.js';
import { withCommunicator, type SessionCliOptions } from '../common/session.js';

export async function statusCommand(options: SessionCliOptions): Promise<number> {
  const name = getProviderProfile(options.provider).displayName;

  return withCommunicator(options, (communicator) => {
    const status = communicator.getStatus();

    console.log(chalk.cyan(`\n📊 ${name} status\n`));
    console.log(chalk.gray(`   Session ID: ${status.sessionId || '(none)'}`));
    console.log(chalk.gray(`   Runtime dir: ${status.runtimeDir || '(none)'}`));
    console.log(chalk.gray(`   Terminal: ${status.terminal}`));
    console.log(chalk.gray(`   Pane: ${status.paneId || '(none)'}`));
    console.log(chalk.gray(`   Transcript: ${status.transcriptPath || '(not found yet)'}`));
    if (status.inputFifo) {
      console.log(chalk.gray(`   Input FIFO: ${status.inputFifo}`));
    }
    if (status.codexPid !== undefined) {
      console.log(chalk.gray(`   Codex PID: ${status.codexPid}`));
    }
    const health = status.healthy ? chalk.green('● healthy') : chalk.red('○ unhealthy');
    console.log(chalk.white('   Health:'), health, chalk.gray(`(${status.status})`));
    console.log('');

    return status.healthy ? 0 : 1;
  });
}
