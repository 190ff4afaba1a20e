/**
 * vee main
 *
 * Loads configuration, takes over the terminal and runs the editor until it
 * exits. The terminal is restored on every path out: normal exit, terminal
 * failure, crash or signal.
 */

import { ConfigManager } from './config/config-manager.ts';
import { debugLog, setDebugEnabled } from './debug.ts';
import { Editor } from './editor/editor.ts';
import { isTerminalIoError } from './terminal/errors.ts';
import { NodeTerminal, withTerminal, type TerminalIO } from './terminal/terminal.ts';

export interface RunOptions {
  debug?: boolean;
  workingDirectory?: string;
  homeDirectory?: string;
  /** Supplied by tests; defaults to a NodeTerminal on stdin/stdout */
  createTerminal?: (escapeTimeout: number) => TerminalIO;
}

/**
 * Run one editing session. Resolves with the process exit code.
 */
export async function runEditor(options: RunOptions = {}): Promise<number> {
  setDebugEnabled(options.debug ?? false);
  debugLog('[Main] Starting vee');

  const config = new ConfigManager({
    workingDirectory: options.workingDirectory ?? process.cwd(),
    homeDirectory: options.homeDirectory,
  });
  const settings = await config.load();

  const escapeTimeout = settings.get('editor.escapeTimeout');
  const terminal = options.createTerminal
    ? options.createTerminal(escapeTimeout)
    : new NodeTerminal({ escapeTimeout });
  const editor = new Editor({ terminal, settings });

  const restore = installProcessGuards(terminal);
  try {
    await withTerminal(terminal, () => editor.run());
    debugLog('[Main] Exited normally');
    return 0;
  } catch (error) {
    if (isTerminalIoError(error)) {
      debugLog(`[Main] Terminal ${error.operation} failure: ${error.message}`);
    } else {
      debugLog(`[Main] Fatal error: ${error instanceof Error ? error.stack : String(error)}`);
    }
    return 1;
  } finally {
    restore();
  }
}

/**
 * Restore the terminal before the process dies on a signal or crash.
 * Returns a function that removes the handlers again.
 */
function installProcessGuards(terminal: TerminalIO): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    debugLog(`[Main] Received ${signal}, shutting down`);
    terminal.leave();
    process.exit(0);
  };

  const onCrash = (reason: unknown): void => {
    debugLog(`[CRASH] ${reason instanceof Error ? reason.stack : String(reason)}`);
    terminal.leave();
    process.exit(1);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  process.on('uncaughtException', onCrash);
  process.on('unhandledRejection', onCrash);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    process.off('uncaughtException', onCrash);
    process.off('unhandledRejection', onCrash);
  };
}
