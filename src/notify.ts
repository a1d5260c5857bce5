import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from './utils.js';

const execFileAsync = promisify(execFile);

const NOTIFY_TIMEOUT_MS = 5_000;

export interface Notifier {
  notify(title: string, content: string): Promise<void>;
}

export const silentNotifier: Notifier = {
  notify: async () => undefined,
};

/**
 * Android notifications through Termux:API. Failures are logged, never thrown.
 */
export class TermuxNotifier implements Notifier {
  constructor(
    private readonly logger: Logger,
    private readonly binary: string = 'termux-notification',
  ) {}

  async notify(title: string, content: string): Promise<void> {
    try {
      await execFileAsync(this.binary, ['--title', title, '--content', content, '--priority', 'default'], {
        timeout: NOTIFY_TIMEOUT_MS,
      });
    } catch (error) {
      this.logger.warn(`Notification failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Uses Termux notifications when running inside Termux and the API binary answers.
 */
export const createNotifier = async (isTermux: boolean, logger: Logger): Promise<Notifier> => {
  if (!isTermux) {
    return silentNotifier;
  }
  try {
    await execFileAsync('termux-notification', ['--help'], { timeout: NOTIFY_TIMEOUT_MS });
    return new TermuxNotifier(logger);
  } catch {
    logger.warn('Termux:API not available; notifications disabled');
    return silentNotifier;
  }
};
