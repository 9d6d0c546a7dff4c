import { v4 as uuidv4 } from "uuid";
import { isJsonObject } from "../../contract/json";
import type { BaseMessage } from "../message";
import type { EventContext, WireMessage } from "../types";
import { createLogger } from "../../utils/logger";

const logger = createLogger("host");

/**
 * Generate a messageId with a timestamp prefix (ms since epoch + UUID).
 * This makes it easy to debug when events were created.
 */
export function generateMessageId(): string {
  return `${Date.now()}-${uuidv4()}`;
}

/**
 * Turns a message carrying identity into the payload sent to the data plane.
 *
 * - Adds a unique messageId.
 * - Uses the host context, overlaid by the caller's context when that is an
 *   object; any other caller context is ignored.
 */
export function enrichEvent(
  message: BaseMessage & { anonymousId?: string },
  hostContext: EventContext
): WireMessage {
  const { context: callerContext, ...rest } = message;

  let context: EventContext = hostContext;
  if (isJsonObject(callerContext)) {
    context = { ...hostContext, ...callerContext };
  } else if (callerContext !== undefined) {
    logger.warn("Ignoring non-object context on", message.type, "event");
  }

  return {
    ...rest,
    messageId: generateMessageId(),
    context,
  };
}
