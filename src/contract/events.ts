import { z } from "zod";
import { ValidationError } from "./errors";
import { jsonObjectSchema, jsonValueSchema } from "./json";

/** One of the six analytics calls. */
export type EventKind =
  | "identify"
  | "track"
  | "page"
  | "screen"
  | "group"
  | "alias";

export const EVENT_KINDS: readonly EventKind[] = [
  "identify",
  "track",
  "page",
  "screen",
  "group",
  "alias",
];

const requiredString = z
  .string()
  .refine((value) => value.trim().length > 0, {
    message: "must be a non-empty string",
  });

/**
 * Metadata every event may carry.
 * - `originalTimestamp`: client-side event time; ingestion time is used when absent.
 * - `context`: free-form environment metadata.
 * - `integrations`: per-destination routing toggles, passed through untouched.
 */
const envelope = {
  originalTimestamp: z
    .string()
    .datetime({ offset: true, message: "must be an ISO-8601 date-time" })
    .nullish(),
  context: jsonValueSchema.nullish(),
  integrations: jsonValueSchema.nullish(),
};

export const identifySchema = z
  .object({
    traits: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

export const trackSchema = z
  .object({
    event: requiredString,
    properties: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

export const pageSchema = z
  .object({
    name: requiredString,
    properties: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

export const screenSchema = z
  .object({
    name: requiredString,
    properties: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

export const groupSchema = z
  .object({
    groupId: requiredString,
    traits: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

export const aliasSchema = z
  .object({
    userId: requiredString,
    previousId: requiredString,
    traits: jsonObjectSchema.nullish(),
    ...envelope,
  })
  .strict();

/** Records who the current user is, with optional traits. */
export type Identify = z.infer<typeof identifySchema>;
/** A named user action. */
export type Track = z.infer<typeof trackSchema>;
/** A page view; `name` is usually the path. */
export type Page = z.infer<typeof pageSchema>;
/** The mobile/desktop counterpart of a page view. */
export type Screen = z.infer<typeof screenSchema>;
/** Associates the current user with a group (company, team, project). */
export type Group = z.infer<typeof groupSchema>;
/** Merges `previousId` into `userId`. */
export type Alias = z.infer<typeof aliasSchema>;

export interface EventByKind {
  identify: Identify;
  track: Track;
  page: Page;
  screen: Screen;
  group: Group;
  alias: Alias;
}

export const eventSchemas: {
  [K in EventKind]: z.ZodType<EventByKind[K], z.ZodTypeDef, unknown>;
} = {
  identify: identifySchema,
  track: trackSchema,
  page: pageSchema,
  screen: screenSchema,
  group: groupSchema,
  alias: aliasSchema,
};

/**
 * Parses `input` as an event of the given kind.
 * Returns a fresh copy; throws {@link ValidationError} naming the offending field.
 */
export function validateEvent<K extends EventKind>(
  kind: K,
  input: unknown
): EventByKind[K] {
  const result = eventSchemas[kind].safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  if (issue.code === "unrecognized_keys") {
    const field = issue.keys[0];
    throw new ValidationError(field, `${kind}.${field} is not a known field`);
  }

  const field = issue.path.length ? String(issue.path[0]) : kind;
  const where = issue.path.length ? `${kind}.${issue.path.join(".")}` : kind;
  throw new ValidationError(field, `${where} ${lowerFirst(issue.message)}`);
}

function lowerFirst(message: string): string {
  return message.charAt(0).toLowerCase() + message.slice(1);
}
