export { createCommands } from "./commands";
export type { AnalyticsCommands } from "./commands";
export { createGuestAnalytics } from "./createGuestAnalytics";
export type { GuestAnalytics, GuestAnalyticsOptions } from "./createGuestAnalytics";
export { browserEnvironment } from "./environment";
export type { NavigationEnvironment } from "./environment";
export { addPageProperties, getPageProperties } from "./pageContext";
export type { PageProperties } from "./pageContext";
export { watchURLChanges } from "./watchURLChanges";
export type { StopWatching } from "./watchURLChanges";
