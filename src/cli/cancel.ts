export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface InstalledCliCancellation {
  /** Flips on the first SIGINT/SIGTERM; handed to the orchestrator. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen. */
  count: number;
  dispose(): void;
}

const DEFAULT_FORCE_EXIT_GRACE_MS = 6_500;

/**
 * First Ctrl+C / SIGTERM aborts the active run (the engine child gets SIGTERM, then
 * SIGKILL after the runner's delay). A second one exits after a grace period.
 */
export function installCliCancellation(opts: {
  onCancel?: (signal: CancelSignal) => void;
  /** Defaults to `process.exit` with 130 (SIGINT) or 143 (SIGTERM). */
  onForceExit?: (signal: CancelSignal) => void;
} = {}): InstalledCliCancellation {
  const controller = new AbortController();
  let count = 0;
  let disposed = false;
  let forceTimer: NodeJS.Timeout | null = null;

  // Covers the runner's SIGTERM → SIGKILL delay (5s).
  const graceMs = (() => {
    const raw = Number(process.env.SHUTTLE_FORCE_EXIT_GRACE_MS ?? '');
    return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : DEFAULT_FORCE_EXIT_GRACE_MS;
  })();

  const forceExit =
    opts.onForceExit ??
    ((signal: CancelSignal) => {
      process.exit(signal === 'SIGTERM' ? 143 : 130);
    });

  const trigger = (signal: CancelSignal) => {
    if (disposed) return;
    count += 1;
    if (count === 1) {
      controller.abort(new Error(`cancelled by ${signal}`));
      opts.onCancel?.(signal);
      return;
    }
    if (forceTimer) return;
    forceTimer = setTimeout(() => forceExit(signal), graceMs);
    forceTimer.unref();
  };

  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');

  // `on`, not `once`: the second press force-exits.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
      if (forceTimer) clearTimeout(forceTimer);
    }
  };
}
