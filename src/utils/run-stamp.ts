export interface RunStampParts {
  date: string; // YYYY-MM-DD
  time: string; // HHMMSS
}

/** `YYYY-MM-DD/HHMMSS` in UTC; the run directory path under `<vault>/runs/`. */
export function formatRunStamp(now: Date = new Date()): RunStampParts {
  const yyyy = now.getUTCFullYear();
  const mm = pad2(now.getUTCMonth() + 1);
  const dd = pad2(now.getUTCDate());
  const hh = pad2(now.getUTCHours());
  const mi = pad2(now.getUTCMinutes());
  const ss = pad2(now.getUTCSeconds());
  return { date: `${yyyy}-${mm}-${dd}`, time: `${hh}${mi}${ss}` };
}

export function runStampLabel(parts: RunStampParts): string {
  return `${parts.date}/${parts.time}`;
}

/** `YYYY-MM-DDTHHMMSSZ`, the timestamp recorded for a run in the digest. */
export function runStampTimestamp(parts: RunStampParts): string {
  return `${parts.date}T${parts.time}Z`;
}

/**
 * Parse a date directory name and a run directory name back into a UTC instant.
 * Returns null for names that do not follow the convention or name an impossible date.
 */
export function parseRunStamp(date: string, time: string): Date | null {
  const d = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  const t = /^(\d{2})(\d{2})(\d{2})$/.exec(time);
  if (!d || !t) return null;

  const [year, month, day] = [Number(d[1]), Number(d[2]), Number(d[3])];
  const [hour, minute, second] = [Number(t[1]), Number(t[2]), Number(t[3])];
  if (hour > 23 || minute > 59 || second > 59) return null;

  const at = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls 2026-02-30 over into March.
  if (at.getUTCFullYear() !== year || at.getUTCMonth() !== month - 1 || at.getUTCDate() !== day) return null;
  return at;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}
