import ora from 'ora';

import type { StepResult } from '../../core/report/types.js';
import { stepResultLine, stepResultText } from './format.js';
import { theme } from './theme.js';

/** Progress line of the step in flight; it turns into that step's result line. */
export interface StepSpinner {
  /** Replace the spinner with the result line, symbol chosen by status. */
  finish(result: StepResult): void;
  /** Drop the spinner without a result (run aborted, error shown instead). */
  stop(): void;
}

/**
 * Without a TTY (CI, piped output) the step's start and result are printed as two plain lines.
 * Output goes to stderr, or to stdout in verbose mode where debug lines would overwrite the frame.
 */
export function startStepSpinner(
  text: string,
  opts: { env?: NodeJS.ProcessEnv; stream?: NodeJS.WritableStream & { isTTY?: boolean } } = {}
): StepSpinner {
  const env = opts.env ?? process.env;
  const stream = opts.stream ?? pickStream(env);

  if (!stream.isTTY || env.SHUTTLE_QUIET === '1') {
    stream.write(`  ${text}\n`);
    return {
      finish: (result) => {
        stream.write(`${stepResultLine(result)}\n`);
      },
      stop: () => undefined
    };
  }

  // ora turns itself off under CI=1; a TTY is reason enough to animate.
  const spinner = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    finish: (result) => {
      const line = stepResultText(result);
      switch (result.status) {
        case 'succeeded':
          spinner.succeed(line);
          return;
        case 'warned':
          spinner.warn(line);
          return;
        case 'failed':
          spinner.fail(line);
          return;
        case 'skipped':
          spinner.stopAndPersist({ symbol: theme.skip, text: line });
          return;
      }
    },
    stop: () => {
      spinner.stop();
    }
  };
}

function pickStream(env: NodeJS.ProcessEnv): NodeJS.WriteStream {
  if (env.SHUTTLE_VERBOSE === '1' && process.stdout.isTTY) return process.stdout;
  return process.stderr.isTTY ? process.stderr : process.stdout;
}
