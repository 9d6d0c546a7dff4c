import type { EventByKind, EventKind } from "../contract/events";
import type { JsonObject, JsonValue } from "../contract/json";

/** A wire message before identity and delivery metadata are added. */
export interface BaseMessage {
  type: EventKind;
  userId?: string;
  event?: string;
  name?: string;
  groupId?: string;
  previousId?: string;
  properties?: JsonObject;
  traits?: JsonObject;
  originalTimestamp?: string;
  /** Caller-supplied context, merged over the host context later. */
  context?: JsonValue;
  integrations?: JsonValue;
}

/**
 * Maps a validated event onto the wire shape. `null` members are dropped so
 * the data plane only sees fields that were actually set.
 */
export function toBaseMessage<K extends EventKind>(
  kind: K,
  event: EventByKind[K]
): BaseMessage {
  const message: BaseMessage = { type: kind };
  const input: EventByKind[EventKind] = event;

  if (input.originalTimestamp != null) message.originalTimestamp = input.originalTimestamp;
  if (input.context != null) message.context = input.context;
  if (input.integrations != null) message.integrations = input.integrations;

  if ("event" in input) message.event = input.event;
  if ("name" in input) message.name = input.name;
  if ("groupId" in input) message.groupId = input.groupId;
  if ("userId" in input) message.userId = input.userId;
  if ("previousId" in input) message.previousId = input.previousId;
  if ("properties" in input && input.properties != null) {
    message.properties = input.properties;
  }
  if ("traits" in input && input.traits != null) message.traits = input.traits;

  return message;
}
