import { AnalyticsPlugin } from "./AnalyticsPlugin";
import type { PluginOptions } from "./types";

/**
 * Creates the host plugin. Call `setup()` once the host is starting, route
 * boundary calls to `dispatch()`, and call `exit()` on shutdown.
 *
 * ```ts
 * const plugin = createAnalyticsPlugin({
 *   dataPlaneUrl: "https://dataplane.example.com",
 *   writeKey: "test-write-key",
 *   configDir: appConfigDir,
 * });
 * await plugin.setup();
 * ```
 */
export function createAnalyticsPlugin(options: PluginOptions): AnalyticsPlugin {
  return new AnalyticsPlugin(options);
}
