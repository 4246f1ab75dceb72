import { Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { stepResultLine } from '../src/cli/ui/format.js';
import { startStepSpinner } from '../src/cli/ui/spinner.js';
import type { StepResult } from '../src/core/report/types.js';

function capture(): { stream: Writable; text: () => string } {
  let out = '';
  const stream = new Writable({
    write(chunk, _encoding, done) {
      out += String(chunk);
      done();
    }
  });
  return { stream, text: () => out };
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

function result(status: StepResult['status']): StepResult {
  return {
    stepId: 'generate-buildings',
    ordinal: 3,
    name: 'Generate buildings',
    kind: 'external',
    optional: false,
    status,
    artifacts: [],
    diagnostic: 'buildings job finished in 1200ms',
    elapsedMs: 1200
  };
}

describe('startStepSpinner', () => {
  it('prints the start line and then the result line when the stream is not a terminal', async () => {
    const out = capture();
    const spinner = startStepSpinner('[3/5] Generate buildings', { stream: out.stream, env: {} });

    spinner.finish(result('warned'));
    await settle();

    expect(out.text()).toBe(`  [3/5] Generate buildings\n${stepResultLine(result('warned'))}\n`);
  });

  it('prints nothing more when stopped without a result', async () => {
    const out = capture();
    const spinner = startStepSpinner('[1/2] Export splines', { stream: out.stream, env: {} });

    spinner.stop();
    await settle();

    expect(out.text()).toBe('  [1/2] Export splines\n');
  });
});
