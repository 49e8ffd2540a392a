import type { LocationId } from '../types';
import { UI_STRINGS, formatString } from '../ui/strings';

/**
 * One entry of the playthrough: where the player was, and which command
 * led from here to the following entry (null on the most recent one).
 */
export interface LogEvent {
  readonly locationId: LocationId;
  readonly description: string;
  readonly nextCommand: string | null;
}

/**
 * Ordered, append-only history of a session.
 *
 * Records are immutable; appending replaces the previous tail with a copy
 * carrying the command that caused the transition. Neighbours are reached by
 * index, so traversal works in both directions without stored links.
 */
export class EventList {
  private readonly records: LogEvent[] = [];

  get first(): LogEvent | undefined {
    return this.records[0];
  }

  get last(): LogEvent | undefined {
    return this.records[this.records.length - 1];
  }

  get length(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  /**
   * Appends an event. `command` is the command that led to it; it is stored
   * on the previous event and ignored when the list is empty.
   */
  addEvent(event: { locationId: LocationId; description: string }, command: string | null = null): void {
    const tail = this.last;
    if (tail) {
      this.records[this.records.length - 1] = { ...tail, nextCommand: command };
    }
    this.records.push({ locationId: event.locationId, description: event.description, nextCommand: null });
  }

  /**
   * Drops the most recent event; the new tail forgets its outgoing command.
   */
  removeLastEvent(): void {
    if (this.records.length === 0) return;

    this.records.pop();
    const tail = this.last;
    if (tail) {
      this.records[this.records.length - 1] = { ...tail, nextCommand: null };
    }
  }

  at(index: number): LogEvent | undefined {
    if (index < 0) return undefined;
    return this.records[index];
  }

  /** Oldest to newest */
  *forward(): IterableIterator<LogEvent> {
    for (let i = 0; i < this.records.length; i++) {
      yield this.records[i];
    }
  }

  /** Newest to oldest */
  *backward(): IterableIterator<LogEvent> {
    for (let i = this.records.length - 1; i >= 0; i--) {
      yield this.records[i];
    }
  }

  /** Visited location ids in sequence */
  getIdLog(): LocationId[] {
    return this.records.map((event) => event.locationId);
  }

  /** The commands issued, in order */
  getCommands(): string[] {
    return this.records.flatMap((event) => (event.nextCommand === null ? [] : [event.nextCommand]));
  }

  /** One line per event, as shown by the `log` command */
  format(): string[] {
    return this.records.map((event) =>
      formatString(UI_STRINGS.logLine, {
        id: event.locationId,
        command: event.nextCommand ?? UI_STRINGS.noCommand,
      })
    );
  }
}
