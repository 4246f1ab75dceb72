import { execa, ExecaError } from 'execa';
import { createInterface } from 'node:readline';

import { Logger, silentLogger } from '../../utils/logger.js';
import { collectErrorLines, type InvokeOptions, type ProcessOutcome, type ProcessRunner } from './types.js';

const FORCE_KILL_AFTER_MS = 5_000;

/**
 * Runs the Headless Engine (or any batch tool) as a child process and waits for it.
 *
 * Never rejects for process-level failures: non-zero exits, timeouts, aborts and
 * spawn errors all come back as a `ProcessOutcome`.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger = silentLogger) {}

  async invoke(executable: string, args: readonly string[], opts: InvokeOptions): Promise<ProcessOutcome> {
    const started = Date.now();
    this.logger.debug('process spawn', { executable, args, timeoutMs: opts.timeoutMs, cwd: opts.cwd });

    const proc = execa(executable, [...args], {
      cwd: opts.cwd,
      env: opts.env,
      stdin: 'ignore',
      all: true,
      timeout: opts.timeoutMs,
      cancelSignal: opts.signal,
      killSignal: 'SIGTERM',
      forceKillAfterDelay: FORCE_KILL_AFTER_MS,
      reject: false
    });

    const onLine = opts.onLine;
    if (onLine && proc.all) {
      const rl = createInterface({ input: proc.all, crlfDelay: Infinity });
      rl.on('line', (line) => onLine(line));
    }

    const result = await proc;
    const capturedOutput = typeof result.all === 'string' ? result.all : '';
    const aborted = result.isCanceled;
    const timedOut = result.timedOut || aborted;
    const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
    const signal = typeof result.signal === 'string' ? result.signal : null;

    const outcome: ProcessOutcome = {
      executable,
      args: [...args],
      exitCode,
      capturedOutput,
      timedOut,
      aborted,
      signal,
      errorLines: collectErrorLines(capturedOutput),
      durationMs: Date.now() - started
    };

    if (exitCode === null && signal === null && !timedOut && result instanceof ExecaError) {
      outcome.spawnError = result.shortMessage;
    }

    this.logger.debug('process exit', {
      executable,
      exitCode,
      signal,
      timedOut,
      aborted,
      durationMs: outcome.durationMs,
      spawnError: outcome.spawnError
    });
    return outcome;
  }
}
