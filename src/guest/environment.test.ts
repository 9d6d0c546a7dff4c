import type { JsonValue } from "../contract/json";
import { createGuestAnalytics } from "./createGuestAnalytics";
import { browserEnvironment } from "./environment";

const NO_WINDOW =
  "No browser window available. Pass an `environment` to createGuestAnalytics().";

describe("without a browser window", () => {
  it("cannot build the browser environment", () => {
    expect(() => browserEnvironment()).toThrow(NO_WINDOW);
  });

  it("still sends events that need no page context", async () => {
    const invoke = jest.fn(async (): Promise<JsonValue> => null);
    const analytics = createGuestAnalytics({ invoke });

    await analytics.sendPageEvent({ name: "/home" });
    await analytics.sendIdentifyEvent({ traits: { plan: "pro" } });

    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it("fails track and URL watching with a plain Error and sends nothing", async () => {
    const invoke = jest.fn(async (): Promise<JsonValue> => null);
    const analytics = createGuestAnalytics({ invoke });

    const attempt = analytics.sendTrackEvent({ event: "Saved" });

    await expect(attempt).rejects.toThrow(NO_WINDOW);
    await expect(attempt).rejects.toHaveProperty("name", "Error");
    expect(() => analytics.watchURLChanges()).toThrow(NO_WINDOW);
    expect(invoke).not.toHaveBeenCalled();
  });
});
