import { log, logError } from "../logger";
import type { SimEventEntry } from "./types";

export interface EventLogger {
  append(event: SimEventEntry): void;
  getRecent?(limit?: number): SimEventEntry[];
}

export class InMemoryEventLog implements EventLogger {
  private events: SimEventEntry[] = [];

  constructor(private readonly capacity = 5000) {}

  append(event: SimEventEntry): void {
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.shift();
    }
  }

  getRecent(limit = 50): SimEventEntry[] {
    return this.events.slice(-limit);
  }
}

/** One line per event: `[event:<type>] {"runId":...,...payload}`. */
export class ConsoleEventLog implements EventLogger {
  append(event: SimEventEntry): void {
    log(`[event:${event.type}]`, JSON.stringify({ runId: event.runId, ...event.payload }));
  }
}

/**
 * Fans events out to several sinks. A sink that throws is logged and skipped;
 * it never aborts the shift.
 */
export class CompositeEventLog implements EventLogger {
  private readonly loggers: EventLogger[];
  private readonly memoryLog?: InMemoryEventLog;

  constructor(...loggers: EventLogger[]) {
    this.loggers = loggers;
    this.memoryLog = loggers.find((l): l is InMemoryEventLog => l instanceof InMemoryEventLog);
  }

  append(event: SimEventEntry): void {
    for (const logger of this.loggers) {
      try {
        logger.append(event);
      } catch (err) {
        logError("[sim-event] sink failed", event.type, err);
      }
    }
  }

  getRecent(limit = 50): SimEventEntry[] {
    return this.memoryLog?.getRecent(limit) ?? [];
  }
}
