import type { CommandRouter, Invoke } from "../contract/commands";

/**
 * An {@link Invoke} that crosses no process boundary but still serializes:
 * the payload is turned into JSON text and parsed back before the router
 * sees it, so guest and host never share object references.
 */
export function createInProcessInvoke(router: CommandRouter): Invoke {
  return async (command, payload) => {
    const wire = JSON.stringify(payload);
    if (wire === undefined) {
      throw new Error(`Payload for ${command} is not serializable`);
    }
    const decoded: unknown = JSON.parse(wire);
    return router.dispatch(command, decoded);
  };
}
