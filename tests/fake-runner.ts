import type { InvokeOptions, ProcessOutcome, ProcessRunner } from '../src/core/process/types.js';
import { collectErrorLines } from '../src/core/process/types.js';
import { writeText } from '../src/utils/fs.js';

export interface FakeProcessResult {
  exitCode?: number | null;
  output?: string;
  timedOut?: boolean;
  aborted?: boolean;
  /** Write every `--rop_*` output path found in the args. */
  writeOutputs?: boolean;
}

export type FakeHandler = (call: { executable: string; args: string[]; opts: InvokeOptions }) => FakeProcessResult | Promise<FakeProcessResult>;

/** Scripted stand-in for the Headless Engine; records every invocation. */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: Array<{ executable: string; args: string[]; timeoutMs: number }> = [];

  constructor(private handler: FakeHandler = () => ({ exitCode: 0, writeOutputs: true })) {}

  async invoke(executable: string, args: readonly string[], opts: InvokeOptions): Promise<ProcessOutcome> {
    const argv = [...args];
    this.calls.push({ executable, args: argv, timeoutMs: opts.timeoutMs });
    const res = await this.handler({ executable, args: argv, opts });

    if (res.writeOutputs) {
      for (const path of outputPaths(argv)) {
        await writeText(path, path.endsWith('.csv') ? 'Name,Mesh\nrow_0,/Game/Meshes/SM_block\n' : `generated by ${executable}\n`);
      }
    }
    const output = res.output ?? '';
    for (const line of output.split('\n').filter(Boolean)) opts.onLine?.(line);

    const timedOut = res.timedOut === true || res.aborted === true;
    return {
      executable,
      args: argv,
      exitCode: timedOut ? null : res.exitCode ?? 0,
      capturedOutput: output,
      timedOut,
      aborted: res.aborted === true,
      signal: timedOut ? 'SIGTERM' : null,
      errorLines: collectErrorLines(output),
      durationMs: 1
    };
  }
}

export function outputPaths(args: readonly string[]): string[] {
  const out: string[] = [];
  args.forEach((a, i) => {
    const next = args[i + 1];
    if (a.startsWith('--rop_') && next !== undefined) out.push(next);
  });
  return out;
}

export function argValue(args: readonly string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i === -1 ? undefined : args[i + 1];
}
