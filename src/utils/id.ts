export interface RunIdParts {
  yyyyMMdd: string; // YYYYMMDD
  nnn: string; // 3 digits
}

export function formatRunId(parts: RunIdParts): string {
  return `r-${parts.yyyyMMdd}-${parts.nnn}`;
}

export function parseRunId(runId: string): RunIdParts | null {
  const m = /^r-(\d{8})-(\d{3})$/.exec(runId);
  if (!m) return null;
  return { yyyyMMdd: m[1] ?? '', nnn: m[2] ?? '' };
}

/**
 * Next run id for `now`, continuing the day's sequence from the ids that already exist.
 * Ids from other days (or that do not parse) are ignored.
 */
export function nextRunId(existing: readonly string[], now: Date = new Date()): string {
  const yyyyMMdd = formatDate(now);
  let seq = 0;
  for (const id of existing) {
    const parts = parseRunId(id);
    if (!parts || parts.yyyyMMdd !== yyyyMMdd) continue;
    seq = Math.max(seq, Number(parts.nnn));
  }
  return formatRunId({ yyyyMMdd, nnn: String(seq + 1).padStart(3, '0') });
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
