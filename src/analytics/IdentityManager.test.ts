import { IdentityManager } from "./IdentityManager";
import { ConfigStore, defaultConfig, type PersistedConfig } from "./utils/configStore";

jest.spyOn(console, "warn").mockImplementation(() => {});

const makeStore = (initial: PersistedConfig) => {
  const store = new ConfigStore("/unused");
  const load = jest.spyOn(store, "load").mockResolvedValue(initial);
  const save = jest.spyOn(store, "save").mockResolvedValue(undefined);
  return { store, load, save };
};

describe("IdentityManager", () => {
  it("loads the persisted anonymous id and saves it back", async () => {
    const { store, save } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);

    await manager.init();

    expect(manager.getAnonymousId()).toBe("anon-123");
    expect(save).toHaveBeenCalledWith(expect.objectContaining({ anonymousId: "anon-123" }));
  });

  it("prefers an explicitly provided anonymous id", async () => {
    const { store, save } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);

    await manager.init("anon-override");

    expect(manager.getAnonymousId()).toBe("anon-override");
    expect(save).toHaveBeenCalledWith(
      expect.objectContaining({ anonymousId: "anon-override" })
    );
  });

  it("does not fail init when saving fails", async () => {
    const { store, save } = makeStore(defaultConfig("anon-123"));
    save.mockRejectedValue(new Error("read-only file system"));
    const manager = new IdentityManager(store);

    await expect(manager.init()).resolves.toBeUndefined();
    expect(console.warn).toHaveBeenCalled();
  });

  it("persists a new anonymous id", async () => {
    const { store, save } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);
    await manager.init();

    await manager.setAnonymousId("anon-456");

    expect(manager.getAnonymousId()).toBe("anon-456");
    expect(save).toHaveBeenLastCalledWith(
      expect.objectContaining({ anonymousId: "anon-456" })
    );
  });

  it("connects a user id to the current anonymous id once", async () => {
    const { store } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);
    await manager.init();

    expect(manager.setUserId("user-1")).toBe(false);
    await manager.setAnonymousId("anon-456");
    expect(manager.setUserId("user-1")).toBe(true);

    expect(manager.getUserId()).toBe("user-1");
    expect(manager.getConnectedIds()).toEqual({ "user-1": "anon-123" });
  });

  it("adds anonymous and user id to non-alias messages", async () => {
    const { store } = makeStore({ ...defaultConfig("anon-123"), userId: "user-1" });
    const manager = new IdentityManager(store);
    await manager.init();

    expect(manager.addIdentityInfo({ type: "track", event: "Clicked" })).toEqual({
      type: "track",
      event: "Clicked",
      anonymousId: "anon-123",
      userId: "user-1",
    });
  });

  it("omits userId when no user is known", async () => {
    const { store } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);
    await manager.init();

    expect(manager.addIdentityInfo({ type: "page", name: "/home" })).toEqual({
      type: "page",
      name: "/home",
      anonymousId: "anon-123",
    });
  });

  it("leaves alias messages untouched", async () => {
    const { store } = makeStore(defaultConfig("anon-123"));
    const manager = new IdentityManager(store);
    await manager.init();
    const alias = { type: "alias" as const, userId: "user-2", previousId: "anon-123" };

    expect(manager.addIdentityInfo(alias)).toBe(alias);
  });
});
