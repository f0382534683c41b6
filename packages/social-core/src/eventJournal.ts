import type { Clock, EngineLogger, JournalEntry, SocialEvent } from "./types.js";

const copyEntry = (entry: JournalEntry): JournalEntry => ({ ...entry, event: { ...entry.event } });

export type EventListener = (entry: JournalEntry) => void;

export class EventJournal {
  private readonly entries: JournalEntry[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly clock: Clock;
  private readonly logger: EngineLogger;

  constructor(clock: Clock, logger: EngineLogger) {
    this.clock = clock;
    this.logger = logger;
  }

  append(event: SocialEvent): JournalEntry {
    const entry: JournalEntry = {
      sequence: this.entries.length + 1,
      emittedAt: this.clock().toISOString(),
      event
    };
    this.entries.push(entry);
    for (const listener of this.listeners) {
      try {
        listener(copyEntry(entry));
      } catch (error) {
        this.logger.error("event.listener_failed", {
          type: event.type,
          sequence: entry.sequence,
          error
        });
      }
    }
    return copyEntry(entry);
  }

  after(sequence: number): JournalEntry[] {
    return this.entries.slice(Math.max(0, sequence)).map(copyEntry);
  }

  subscribe(listener: EventListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
