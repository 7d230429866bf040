import { TerminalUnavailableError } from '../cli/errors.js';
import type { TerminalDriver } from './terminal.js';

const FATAL_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGHUP'];

// 128 + signal number, as shells report it.
function signalExitCode(signal: NodeJS.Signals): number {
  return signal === 'SIGHUP' ? 129 : 143;
}

/**
 * Owns the terminal between `init` and `restore`: alternate screen, raw
 * input, hidden cursor.
 */
export class TerminalSession {
  private active = true;

  private constructor(readonly driver: TerminalDriver) {}

  static init(driver: TerminalDriver): TerminalSession {
    if (!driver.isTTY()) {
      throw new TerminalUnavailableError('ytui needs an interactive terminal (stdin and stdout must be a TTY).');
    }
    try {
      driver.enter();
    } catch (error) {
      // Undo whatever half of the switch succeeded.
      try {
        driver.leave();
      } catch (leaveError) {
        console.error('Failed to restore terminal:', leaveError);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new TerminalUnavailableError(`Could not switch the terminal to fullscreen raw mode: ${detail}`, {
        cause: error,
      });
    }
    return new TerminalSession(driver);
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Safe to call any number of times; failures are reported, never thrown. */
  restore(): void {
    if (!this.active) return;
    this.active = false;
    try {
      this.driver.leave();
    } catch (error) {
      console.error('Failed to restore terminal:', error);
    }
  }
}

/**
 * Runs `fn` with the terminal switched to fullscreen raw mode and restores it
 * on every way out: return, throw, uncaught exception, unhandled rejection,
 * process exit and termination signals.
 */
export async function withTerminalSession<T>(
  driver: TerminalDriver,
  fn: (session: TerminalSession) => Promise<T>
): Promise<T> {
  const session = TerminalSession.init(driver);

  const onExit = (): void => session.restore();
  const onFatal = (error: unknown): void => {
    session.restore();
    console.error('Unexpected error:', error);
    process.exit(1);
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    session.restore();
    process.exit(signalExitCode(signal));
  };

  process.once('exit', onExit);
  process.on('uncaughtException', onFatal);
  process.on('unhandledRejection', onFatal);
  for (const signal of FATAL_SIGNALS) process.on(signal, onSignal);

  try {
    return await fn(session);
  } finally {
    session.restore();
    process.removeListener('exit', onExit);
    process.removeListener('uncaughtException', onFatal);
    process.removeListener('unhandledRejection', onFatal);
    for (const signal of FATAL_SIGNALS) process.removeListener(signal, onSignal);
  }
}
