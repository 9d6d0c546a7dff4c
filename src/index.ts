export * from "./contract";
export * from "./guest";

export { AnalyticsBridgeProvider } from "./react/context";
export { useAnalyticsBridge } from "./react/useAnalyticsBridge";

export { createAnalyticsPlugin } from "./analytics/init";
export { AnalyticsPlugin, PLUGIN_NAME } from "./analytics/AnalyticsPlugin";
export { AnalyticsHost } from "./analytics/AnalyticsHost";
export { RudderTransport } from "./analytics/RudderTransport";
export type { RudderClient, RudderTransportOptions } from "./analytics/RudderTransport";
export { PerEventCap } from "./analytics/rateLimiters";
export { ConfigStore, CONFIG_FILE_NAME } from "./analytics/utils/configStore";
export type { PersistedConfig } from "./analytics/utils/configStore";
export type {
  AnalyticsTransport,
  EventContext,
  PluginOptions,
  RateLimiter,
  WireMessage,
} from "./analytics/types";

export { createInProcessInvoke } from "./bridge/inProcess";
export { setDebugLogging } from "./utils/logger";
