/**
 * CompText Runtime Host — Compile log reader
 *
 * Pure function over the raw text of `compile.jsonl`.
 *
 * Guarantees:
 * - Lines that are not JSON objects with a string `event_id` are dropped
 *   and counted in `parseErrors`.
 * - Events are deduplicated by `event_id`; the first occurrence wins and
 *   later ones are counted in `duplicates`.
 * - Content that does not end in '\n' has a partial last line; it is
 *   dropped and flagged.
 * - Output is sorted by timestamp, then event_id.
 *
 * No I/O. Callers pass StateIO.readLogRaw() output.
 */

export interface CompileLogEvent {
  /** ULID; the deduplication key. */
  readonly event_id: string;
  readonly timestamp: string;
  /** Every other field of the line, as written. */
  readonly fields: Readonly<Record<string, unknown>>;
}

export interface LogReadStats {
  /** Non-empty complete lines processed. */
  readonly totalLines: number;
  /** Events kept after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<CompileLogEvent>;
  readonly stats: LogReadStats;
}

function toEvent(line: string): CompileLogEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  const fields: Record<string, unknown> = { ...parsed };
  const eventId = fields['event_id'];
  if (typeof eventId !== 'string' || eventId === '') {
    return undefined;
  }
  const timestamp = fields['timestamp'];
  return { event_id: eventId, timestamp: typeof timestamp === 'string' ? timestamp : '', fields };
}

/**
 * Parse, deduplicate and sort compile-log content.
 */
export function readCompileLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, CompileLogEvent>();

  for (const line of lines) {
    const event = toEvent(line);
    if (event === undefined) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.set(event.event_id, event);
    }
  }

  const events = [...seen.values()].sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
