import { commandKind, type CommandRouter } from "../contract/commands";
import type { JsonValue } from "../contract/json";
import { createLogger, isDebugLogging, setDebugLogging } from "../utils/logger";
import { AnalyticsHost } from "./AnalyticsHost";
import { IdentityManager } from "./IdentityManager";
import { assertTransportSettings, RudderTransport } from "./RudderTransport";
import type { AnalyticsTransport, Lifecycle, PluginOptions } from "./types";
import { ConfigStore } from "./utils/configStore";
import { getContextInfo } from "./utils/contextInfo";

const logger = createLogger("host");

export const PLUGIN_NAME = "analytics";

/**
 * Host side of the bridge.
 * - Routes the six `send_analytics_*` commands to the {@link AnalyticsHost}.
 * - Loads and saves the persisted identity.
 * - Owns the transport and shuts it down on exit.
 */
export class AnalyticsPlugin implements CommandRouter {
  readonly name = PLUGIN_NAME;
  readonly host: AnalyticsHost;

  private lifecycle: Lifecycle = "idle";
  private setupPromise: Promise<void> | null = null;
  private transport: AnalyticsTransport | null = null;
  private readonly identity: IdentityManager;

  constructor(private readonly options: PluginOptions) {
    logger.log("Creating analytics plugin for", options.dataPlaneUrl);

    assertTransportSettings(options.dataPlaneUrl, options.writeKey);
    if (!options.configDir || options.configDir.trim() === "") {
      throw new Error(
        "Analytics plugin initialization failed: `configDir` is required and must be a non-empty string."
      );
    }

    setDebugLogging(options.debug ?? false);
    this.identity = new IdentityManager(new ConfigStore(options.configDir));
    this.host = new AnalyticsHost({
      identity: this.identity,
      transport: () => this.requireTransport(),
      context: () => getContextInfo(options.app),
      isReady: () => this.lifecycle === "ready",
      rateLimiter: options.rateLimiter,
    });
  }

  /**
   * Loads the persisted config, applies `anonymousId` if given, saves the
   * config back and starts the transport. Concurrent calls share one run.
   */
  async setup(): Promise<void> {
    if (this.lifecycle === "ready") {
      logger.log("Analytics plugin already set up");
      return;
    }
    if (this.lifecycle === "exited") {
      logger.warn("Analytics plugin has exited, setup skipped");
      return;
    }
    if (this.lifecycle === "initializing" && this.setupPromise) {
      return this.setupPromise;
    }

    this.lifecycle = "initializing";
    this.setupPromise = (async () => {
      try {
        await this.identity.init(this.options.anonymousId);
        this.transport =
          this.options.transport ??
          new RudderTransport({
            dataPlaneUrl: this.options.dataPlaneUrl,
            writeKey: this.options.writeKey,
            flushIntervalSeconds: this.options.flushIntervalSeconds,
            maxQueueEvents: this.options.maxQueueEvents,
          });
        this.lifecycle = "ready";
        logger.log("Analytics plugin ready");
      } catch (err) {
        this.lifecycle = "idle"; // allow retry
        logger.warn("Analytics plugin setup failed:", err);
        throw err;
      } finally {
        this.setupPromise = null;
      }
    })();

    return this.setupPromise;
  }

  private requireTransport(): AnalyticsTransport {
    if (!this.transport) throw new Error("Analytics plugin is not ready");
    return this.transport;
  }

  /**
   * Handles one boundary call. Resolves `null`; a failure is logged and
   * rejected.
   */
  async dispatch(command: string, payload: unknown): Promise<JsonValue> {
    const kind = commandKind(command);
    if (!kind) {
      throw new Error(`Unknown command: ${command}`);
    }
    try {
      await this.host.sendEvent(kind, payload);
    } catch (err) {
      logger.error("Failed to send analytics event:", command, err);
      throw err;
    }
    return null;
  }

  /**
   * Flushes and shuts down the transport, then saves the config.
   */
  async exit(): Promise<void> {
    if (this.lifecycle !== "ready") return;
    this.lifecycle = "exited";
    try {
      await this.requireTransport().shutdown();
    } catch (err) {
      logger.error("Failed to shut down analytics transport", err);
    }
    await this.identity.persist();
    logger.log("Analytics plugin exited");
  }

  getDebugInfo() {
    return {
      name: this.name,
      lifecycle: this.lifecycle,
      dataPlaneUrl: this.options.dataPlaneUrl,
      writeKey: "***" + this.options.writeKey.slice(-4),
      anonymousId: this.lifecycle === "ready" ? this.identity.getAnonymousId() : undefined,
      userId: this.identity.getUserId(),
      debug: isDebugLogging(),
    };
  }
}
