import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  route: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(route: string, requestId?: string): TraceContext {
  return { requestId: requestId ?? uuidv4(), route, spans: [] };
}

/**
 * Run one pipeline stage inside a span. The span is closed with 'error' when
 * the stage throws, and the error is rethrown.
 */
export async function withSpan<T>(
  ctx: TraceContext,
  name: string,
  fn: (span: SpanRecord) => T | Promise<T>,
): Promise<T> {
  const span: SpanRecord = { name, startTime: Date.now(), attributes: {}, status: 'ok' };
  ctx.spans.push(span);
  try {
    return await fn(span);
  } catch (err) {
    span.status = 'error';
    throw err;
  } finally {
    span.endTime = Date.now();
  }
}

/** Compact per-stage timings for a log line */
export function spanTimings(ctx: TraceContext): Record<string, number> {
  const out: Record<string, number> = {};
  for (const s of ctx.spans) {
    out[s.name] = (s.endTime ?? Date.now()) - s.startTime;
  }
  return out;
}
