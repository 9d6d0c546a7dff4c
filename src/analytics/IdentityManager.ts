import { createLogger } from "../utils/logger";
import type { BaseMessage } from "./message";
import { ConfigStore, defaultConfig, type PersistedConfig } from "./utils/configStore";

const logger = createLogger("host");

/**
 * Owns the host's identity state, persisted through a {@link ConfigStore}.
 * - Loads or generates the anonymous ID.
 * - Remembers the user an Alias switched to, and which anonymous ID it was
 *   connected to.
 * - Stamps identity onto outgoing messages.
 */
export class IdentityManager {
  private config: PersistedConfig = defaultConfig();

  constructor(private readonly store: ConfigStore) {}

  /**
   * Loads the persisted config, applies an explicit anonymous ID if given,
   * and writes the result back. A failed write is logged, not thrown.
   */
  async init(anonymousId?: string): Promise<void> {
    this.config = await this.store.load();
    if (anonymousId) {
      this.config.anonymousId = anonymousId;
      logger.log("Using provided anonymous ID:", anonymousId);
    }
    await this.persist();
    logger.log(
      "IdentityManager initialized with anonymous ID:",
      this.config.anonymousId,
      "userId:",
      this.config.userId
    );
  }

  getAnonymousId(): string {
    return this.config.anonymousId;
  }

  getUserId(): string | undefined {
    return this.config.userId ?? undefined;
  }

  getConnectedIds(): Readonly<Record<string, string>> {
    return this.config.connectedIds;
  }

  /**
   * Replaces the anonymous ID for all later messages and persists it.
   */
  async setAnonymousId(anonymousId: string): Promise<void> {
    this.config.anonymousId = anonymousId;
    logger.log("Anonymous ID set:", anonymousId);
    await this.store.save(this.config);
  }

  /**
   * Makes `userId` the current user.
   * @returns true if `userId` was already connected to an anonymous ID,
   *          false if this call connected it to the current one.
   */
  setUserId(userId: string): boolean {
    this.config.userId = userId;
    if (userId in this.config.connectedIds) return true;
    this.config.connectedIds[userId] = this.config.anonymousId;
    return false;
  }

  /**
   * Adds identity to a message. Alias messages are left as they are; every
   * other kind gets the anonymous ID, and the current user ID unless the
   * message already names one.
   */
  addIdentityInfo(message: BaseMessage): BaseMessage & { anonymousId?: string } {
    if (message.type === "alias") return message;
    const userId = message.userId ?? this.getUserId();
    return {
      ...message,
      anonymousId: this.config.anonymousId,
      ...(userId ? { userId } : {}),
    };
  }

  /** Writes the current state; failures are logged. */
  async persist(): Promise<void> {
    try {
      await this.store.save(this.config);
    } catch (err) {
      logger.warn("Failed to save analytics config", err);
    }
  }
}
