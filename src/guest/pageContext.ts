import type { Track } from "../contract/events";
import { isJsonObject, type JsonObject } from "../contract/json";
import type { NavigationEnvironment } from "./environment";

export interface PageProperties {
  title: string;
  url: string;
  path: string;
}

export function getPageProperties(env: NavigationEnvironment): PageProperties {
  return {
    title: env.document.title,
    url: env.location.href,
    path: env.location.pathname,
  };
}

/**
 * Returns a copy of `message` whose `properties.page` holds the current
 * title, url and path. Other properties are kept; on a key collision inside
 * `page` the fresh values win.
 */
export function addPageProperties(
  message: Track,
  env: NavigationEnvironment
): Track {
  const current = message.properties ?? undefined;
  const properties: JsonObject = isJsonObject(current) ? { ...current } : {};
  const existingPage = properties.page;

  properties.page = {
    ...(isJsonObject(existingPage) ? existingPage : {}),
    ...getPageProperties(env),
  };

  return { ...message, properties };
}
