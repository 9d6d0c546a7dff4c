import os from "node:os";
import pkg from "../../../package.json";
import { getContextInfo, clearContextCache, getTimeZone } from "./contextInfo";

describe("getContextInfo", () => {
  beforeEach(() => {
    clearContextCache();
    jest.spyOn(os, "type").mockReturnValue("Linux");
    jest.spyOn(os, "release").mockReturnValue("6.1.0");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("describes the library, os, locale and time zone", () => {
    const context = getContextInfo();

    expect(context).toEqual({
      library: { name: "analytics-bridge", version: pkg.version },
      os: { name: "Linux", version: "6.1.0" },
      locale: expect.any(String),
      timezone: getTimeZone(),
    });
    expect(context.app).toBeUndefined();
  });

  it("adds the app when one is given without caching it", () => {
    const withApp = getContextInfo({ name: "Notes", version: "2.3.4" });
    expect(withApp.app).toEqual({ name: "Notes", version: "2.3.4" });

    expect(getContextInfo().app).toBeUndefined();
  });

  it("caches the host part until cleared", () => {
    const first = getContextInfo();
    (os.type as jest.Mock).mockReturnValue("Darwin");

    expect(getContextInfo()).toBe(first);

    clearContextCache();
    expect(getContextInfo().os.name).toBe("Darwin");
  });
});

describe("getTimeZone", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("falls back to UTC when Intl throws", () => {
    jest.spyOn(Intl, "DateTimeFormat").mockImplementation(() => {
      throw new Error("no Intl");
    });
    expect(getTimeZone()).toBe("UTC");
  });
});
