import type { EventContext } from "../types";
import { enrichEvent, generateMessageId } from "./enrichEvent";

const hostContext: EventContext = {
  library: { name: "analytics-bridge", version: "1.2.3" },
  os: { name: "Linux", version: "6.1.0" },
  locale: "en-US",
  timezone: "UTC",
};

describe("generateMessageId", () => {
  it("prefixes a uuid with the current time", () => {
    jest.spyOn(Date, "now").mockReturnValue(1700000000000);

    expect(generateMessageId()).toMatch(/^1700000000000-[0-9a-f-]{36}$/);

    jest.restoreAllMocks();
  });
});

describe("enrichEvent", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("adds a messageId and the host context", () => {
    const wire = enrichEvent(
      { type: "track", event: "Clicked", anonymousId: "anon-1" },
      hostContext
    );

    expect(wire).toEqual({
      type: "track",
      event: "Clicked",
      anonymousId: "anon-1",
      messageId: expect.any(String),
      context: hostContext,
    });
  });

  it("overlays an object caller context on the host context", () => {
    const wire = enrichEvent(
      { type: "page", name: "/home", context: { locale: "fr-FR", campaign: { name: "spring" } } },
      hostContext
    );

    expect(wire.context).toEqual({
      ...hostContext,
      locale: "fr-FR",
      campaign: { name: "spring" },
    });
  });

  it("ignores a non-object caller context", () => {
    const wire = enrichEvent({ type: "identify", context: "mobile" }, hostContext);

    expect(wire.context).toEqual(hostContext);
    expect(console.warn).toHaveBeenCalledWith(
      "[AnalyticsBridge:host]",
      "Ignoring non-object context on",
      "identify",
      "event"
    );
  });

  it("gives every message its own id", () => {
    const a = enrichEvent({ type: "track", event: "A" }, hostContext);
    const b = enrichEvent({ type: "track", event: "B" }, hostContext);

    expect(a.messageId).not.toBe(b.messageId);
  });
});
