import Analytics from "@rudderstack/rudder-sdk-node";
import { createLogger } from "../utils/logger";
import type { AnalyticsTransport, WireMessage } from "./types";

const logger = createLogger("transport");

/** Completion callback the RudderStack client calls once a batch settles. */
export type RudderCallback = (err?: Error | null) => void;

/**
 * The calls the transport makes on the RudderStack Node client. The client
 * owns batching, retries and the HTTP requests to the data plane.
 */
export interface RudderClient {
  identify(message: object, callback?: RudderCallback): unknown;
  track(message: object, callback?: RudderCallback): unknown;
  page(message: object, callback?: RudderCallback): unknown;
  screen(message: object, callback?: RudderCallback): unknown;
  group(message: object, callback?: RudderCallback): unknown;
  alias(message: object, callback?: RudderCallback): unknown;
  flush(callback?: RudderCallback): unknown;
}

export interface RudderTransportOptions {
  dataPlaneUrl: string;
  writeKey: string;
  flushIntervalSeconds?: number;
  /** Max events the client holds in memory (default: 2000) */
  maxQueueEvents?: number;
  /** Replaces the RudderStack client, e.g. in tests. */
  client?: RudderClient;
}

/**
 * Validates the data-plane settings. Throws with a descriptive message.
 */
export function assertTransportSettings(dataPlaneUrl: string, writeKey: string) {
  if (!writeKey || typeof writeKey !== "string" || writeKey.trim() === "") {
    throw new Error(
      "Analytics transport initialization failed: `writeKey` is required and must be a non-empty string."
    );
  }

  // "https://example.com" and "https://example.com/api" are valid,
  // "https://example.com/" is not.
  let valid = false;
  try {
    new URL(dataPlaneUrl);
    valid = !dataPlaneUrl.endsWith("/");
  } catch {
    valid = false;
  }
  if (!valid) {
    throw new Error(
      "Analytics transport initialization failed: `dataPlaneUrl` must be a valid URL and not end in a slash."
    );
  }
}

function createRudderClient(options: RudderTransportOptions): RudderClient {
  const clientOptions = {
    dataPlaneUrl: options.dataPlaneUrl,
    flushAt: 20,
    flushInterval: (options.flushIntervalSeconds ?? 10) * 1000,
    maxInternalQueueSize: options.maxQueueEvents ?? 2000,
  };
  return new Analytics(options.writeKey, clientOptions);
}

/**
 * Hands wire messages to the RudderStack client, one call per event kind.
 * `send` resolves once the client has queued the message; a failed delivery
 * is reported later through the client's callback and logged.
 */
export class RudderTransport implements AnalyticsTransport {
  private readonly client: RudderClient;
  private closed = false;

  constructor(options: RudderTransportOptions) {
    assertTransportSettings(options.dataPlaneUrl, options.writeKey);
    this.client = options.client ?? createRudderClient(options);
  }

  async send(message: WireMessage): Promise<void> {
    if (this.closed) {
      throw new Error("Transport has been shut down");
    }

    const { type, ...fields } = message;
    const payload = fields.originalTimestamp
      ? { ...fields, timestamp: new Date(fields.originalTimestamp) }
      : fields;
    const settled: RudderCallback = (err) => {
      if (err) logger.error("Delivery failed for", type, "event", message.messageId, err);
    };

    logger.log("Queueing", type, "event", message.messageId);
    switch (type) {
      case "identify":
        this.client.identify(payload, settled);
        break;
      case "track":
        this.client.track(payload, settled);
        break;
      case "page":
        this.client.page(payload, settled);
        break;
      case "screen":
        this.client.screen(payload, settled);
        break;
      case "group":
        this.client.group(payload, settled);
        break;
      case "alias":
        this.client.alias(payload, settled);
        break;
    }
  }

  /** Asks the client to send what it has queued; rejects if that request fails. */
  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      const pending = this.client.flush((err) => (err ? reject(err) : resolve()));
      if (pending instanceof Promise) {
        void pending.catch((err: unknown) => logger.log("Flush request settled with", err));
      }
    });
  }

  /** Refuses further messages, then makes one final flush attempt. */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.flush();
  }
}
