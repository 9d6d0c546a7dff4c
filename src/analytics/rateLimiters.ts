import type { WireMessage } from "./types";

const WINDOW_MS = 60_000;

interface EventCounter {
  count: number;
  windowStart: number;
}

/**
 * Caps how many messages of each event type pass per minute.
 *
 * Track messages are counted per event name, Page and Screen per page/screen
 * name, and Identify, Group and Alias each share a single counter.
 *
 * ```ts
 * const cap = new PerEventCap(100);
 * plugin.host.setRateLimiter((message) => cap.shouldAllow(message));
 * ```
 */
export class PerEventCap {
  private readonly counters = new Map<string, EventCounter>();

  constructor(
    private readonly eventsPerMinute: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Returns true if the message may be sent, counting it if so. */
  shouldAllow(message: WireMessage): boolean {
    const key = eventTypeOf(message);
    let counter = this.counters.get(key);
    if (!counter) {
      counter = { count: 0, windowStart: this.now() };
      this.counters.set(key, counter);
    }
    this.resetIfExpired(counter);

    if (counter.count < this.eventsPerMinute) {
      counter.count += 1;
      return true;
    }
    return false;
  }

  /** Current count per event type, after expiring stale windows. */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [key, counter] of this.counters) {
      this.resetIfExpired(counter);
      stats[key] = counter.count;
    }
    return stats;
  }

  reset(): void {
    this.counters.clear();
  }

  private resetIfExpired(counter: EventCounter) {
    if (this.now() - counter.windowStart >= WINDOW_MS) {
      counter.count = 0;
      counter.windowStart = this.now();
    }
  }
}

function eventTypeOf(message: WireMessage): string {
  switch (message.type) {
    case "track":
      return message.event ?? "track";
    case "page":
    case "screen":
      return message.name ?? message.type;
    default:
      return message.type;
  }
}
