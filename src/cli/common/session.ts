import chalk from 'chalk';
import { describeError, isPanebridgeError } from '../../errors.js';
import { SessionCommunicator, type OpenSessionOptions } from '../../session/communicator.js';
import type { ProviderName } from '../../types/index.js';

export interface ProviderCliOptions {
  provider: ProviderName;
}

/** Provider plus optional overrides for how the session is opened. */
export type SessionCliOptions = ProviderCliOptions & Partial<Omit<OpenSessionOptions, 'provider'>>;

/**
 * Open the provider's session and run `action` with it. Failures are printed
 * and turned into exit code 1.
 */
export async function withCommunicator(
  options: SessionCliOptions,
  action: (communicator: SessionCommunicator) => Promise<number> | number,
): Promise<number> {
  try {
    const communicator = SessionCommunicator.open({ ...options, provider: options.provider });
    return await action(communicator);
  } catch (error) {
    if (isPanebridgeError(error) && (error.code === 'NO_ACTIVE_SESSION' || error.code === 'TRANSCRIPT_UNAVAILABLE')) {
      console.error(chalk.red(`❌ ${error.message}`));
    } else {
      console.error(chalk.red(`❌ Execution failed: ${describeError(error)}`));
    }
    return 1;
  }
}
