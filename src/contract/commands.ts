import { EVENT_KINDS, type EventKind } from "./events";
import type { JsonValue } from "./json";

/** Stable names under which the host registers one handler per event kind. */
export const COMMANDS = {
  identify: "send_analytics_identify",
  track: "send_analytics_track",
  page: "send_analytics_page",
  screen: "send_analytics_screen",
  group: "send_analytics_group",
  alias: "send_analytics_alias",
} as const satisfies Record<EventKind, string>;

export type CommandName = (typeof COMMANDS)[EventKind];

const KIND_BY_COMMAND = new Map<string, EventKind>(
  EVENT_KINDS.map((kind) => [COMMANDS[kind], kind])
);

/** Returns the event kind a command carries, or `undefined` for unknown names. */
export function commandKind(command: string): EventKind | undefined {
  return KIND_BY_COMMAND.get(command);
}

/**
 * The cross-boundary call: routes a named command with a JSON payload to the
 * host and resolves with the host's JSON result.
 */
export type Invoke = (command: string, payload: JsonValue) => Promise<JsonValue>;

/** What the host side exposes to an {@link Invoke} implementation. */
export interface CommandRouter {
  dispatch(command: string, payload: unknown): Promise<JsonValue>;
}
