import type { WorldEvent, WorldEventDraft } from "@/drones/types";

/**
 * Fixed-capacity ring buffer of world events, oldest evicted first.
 * Events are frozen on append; `seq` increases by one per event for the whole session.
 */
export class EventLog {
  private buffer: (WorldEvent | undefined)[];
  private start = 0;
  private size = 0;
  private nextSeq = 1;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Event log capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<WorldEvent | undefined>(capacity);
  }

  append(draft: WorldEventDraft): WorldEvent {
    const event: WorldEvent = Object.freeze({ ...draft, seq: this.nextSeq++ });
    const slot = (this.start + this.size) % this.capacity;
    this.buffer[slot] = event;
    if (this.size < this.capacity) {
      this.size++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
    return event;
  }

  get length(): number {
    return this.size;
  }

  /** Oldest to newest. */
  toArray(): WorldEvent[] {
    const out: WorldEvent[] = [];
    for (let i = 0; i < this.size; i++) {
      const event = this.buffer[(this.start + i) % this.capacity];
      if (event) out.push(event);
    }
    return out;
  }

  recent(limit: number): WorldEvent[] {
    const all = this.toArray();
    return limit >= all.length ? all : all.slice(all.length - limit);
  }
}
