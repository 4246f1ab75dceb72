export interface InvokeOptions {
  /** Wall-clock limit; the child is terminated when it elapses. */
  timeoutMs: number;
  /** Aborting terminates the child; the outcome then reads `timedOut: true, aborted: true`. */
  signal?: AbortSignal;
  cwd?: string;
  env?: Record<string, string>;
  /** Called once per line of combined stdout/stderr while the child runs. */
  onLine?: (line: string) => void;
}

export interface ProcessOutcome {
  executable: string;
  args: string[];
  /** `null` when the child was killed by a signal or never started. */
  exitCode: number | null;
  /** Combined stdout and stderr, in arrival order. */
  capturedOutput: string;
  timedOut: boolean;
  aborted: boolean;
  signal: string | null;
  /** Output lines carrying an error marker; best-effort only. */
  errorLines: string[];
  durationMs: number;
  /** The child could not be started (e.g. executable not found). */
  spawnError?: string;
}

export interface ProcessRunner {
  invoke(executable: string, args: readonly string[], opts: InvokeOptions): Promise<ProcessOutcome>;
}

export function processSucceeded(outcome: ProcessOutcome): boolean {
  return outcome.exitCode === 0 && !outcome.timedOut && !outcome.spawnError;
}

export function describeProcessFailure(outcome: ProcessOutcome): string {
  if (outcome.spawnError) return `could not start ${outcome.executable}: ${outcome.spawnError}`;
  if (outcome.aborted) return `${outcome.executable} was aborted after ${outcome.durationMs}ms`;
  if (outcome.timedOut) return `${outcome.executable} timed out after ${outcome.durationMs}ms`;
  if (outcome.exitCode === null) return `${outcome.executable} was killed by ${outcome.signal ?? 'a signal'}`;
  return `${outcome.executable} exited with code ${outcome.exitCode}`;
}

const ERROR_MARKER = /\bERROR\b|Traceback|Error:/;

export function collectErrorLines(output: string, limit = 20): string[] {
  const lines: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (!ERROR_MARKER.test(line)) continue;
    lines.push(line.trim());
    if (lines.length >= limit) break;
  }
  return lines;
}
