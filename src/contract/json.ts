import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;

/**
 * A JSON object. Members typed `undefined` are allowed so that optional
 * fields can be written naturally; they are dropped when serialized.
 */
export type JsonObject = { [key: string]: JsonValue | undefined };

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * Objects whose prototype is not `Object.prototype` (or `null`) are class
 * instances and have no faithful JSON form. Everything else is left to the
 * record check, which also reports arrays and scalars.
 */
const plainPrototype = z.custom<unknown>(
  (value) => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return true;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
  },
  { message: "Expected a plain object, received a class instance" }
);

/** Any well-formed JSON value, checked recursively. */
export const jsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(jsonValueSchema),
    jsonObjectSchema,
  ])
);

/** A plain JSON object (not an array, a scalar or a class instance). */
export const jsonObjectSchema: z.ZodType<JsonObject, z.ZodTypeDef, unknown> =
  plainPrototype.pipe(z.record(jsonValueSchema.optional()));

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
