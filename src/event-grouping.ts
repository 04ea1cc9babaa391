import { dayKey } from './timestamps.js';
import type { DayBatch, FileEvent } from './types.js';

/**
 * Split a time-ordered event stream into contiguous runs sharing one calendar day.
 * Only the current run is held in memory.
 */
export function* groupByDay(events: Iterable<FileEvent>): Generator<DayBatch> {
  let current: DayBatch | null = null;

  for (const event of events) {
    const day = dayKey(event.timestamp);
    if (current && current.day === day) {
      current.events.push(event);
      continue;
    }
    if (current) {
      yield current;
    }
    current = { day, events: [event] };
  }

  if (current) {
    yield current;
  }
}
