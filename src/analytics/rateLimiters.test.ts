import { PerEventCap } from "./rateLimiters";
import type { WireMessage } from "./types";

const context: WireMessage["context"] = {
  library: { name: "analytics-bridge", version: "0.0.0" },
  os: { name: "Linux", version: "6.1.0" },
  locale: "en-US",
  timezone: "UTC",
};

const track = (event: string): WireMessage => ({
  type: "track",
  messageId: `m-${event}`,
  event,
  context,
});

describe("PerEventCap", () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000_000;
  });

  it("allows up to the cap per event name within a minute", () => {
    const cap = new PerEventCap(2, clock);

    expect(cap.shouldAllow(track("Clicked"))).toBe(true);
    expect(cap.shouldAllow(track("Clicked"))).toBe(true);
    expect(cap.shouldAllow(track("Clicked"))).toBe(false);
    expect(cap.shouldAllow(track("Opened"))).toBe(true);
  });

  it("opens a new window after 60 seconds", () => {
    const cap = new PerEventCap(1, clock);
    expect(cap.shouldAllow(track("Clicked"))).toBe(true);
    expect(cap.shouldAllow(track("Clicked"))).toBe(false);

    now += 59_999;
    expect(cap.shouldAllow(track("Clicked"))).toBe(false);

    now += 1;
    expect(cap.shouldAllow(track("Clicked"))).toBe(true);
  });

  it("counts pages by name and other kinds by type", () => {
    const cap = new PerEventCap(1, clock);
    const page = (name: string): WireMessage => ({ type: "page", messageId: "p", name, context });
    const identify: WireMessage = { type: "identify", messageId: "i", context };

    expect(cap.shouldAllow(page("/home"))).toBe(true);
    expect(cap.shouldAllow(page("/about"))).toBe(true);
    expect(cap.shouldAllow(page("/home"))).toBe(false);
    expect(cap.shouldAllow(identify)).toBe(true);
    expect(cap.shouldAllow({ ...identify, userId: "user-2" })).toBe(false);

    expect(cap.getStats()).toEqual({ "/home": 1, "/about": 1, identify: 1 });
  });

  it("reports expired windows as zero", () => {
    const cap = new PerEventCap(5, clock);
    cap.shouldAllow(track("Clicked"));
    cap.shouldAllow(track("Clicked"));
    expect(cap.getStats()).toEqual({ Clicked: 2 });

    now += 60_000;
    expect(cap.getStats()).toEqual({ Clicked: 0 });
  });

  it("forgets all counters on reset", () => {
    const cap = new PerEventCap(1, clock);
    cap.shouldAllow(track("Clicked"));

    cap.reset();

    expect(cap.getStats()).toEqual({});
    expect(cap.shouldAllow(track("Clicked"))).toBe(true);
  });
});
