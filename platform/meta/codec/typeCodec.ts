import { z } from "zod";
import { MetaDecodeError, UnsupportedMetaValue, UnsupportedTypeTag } from "../errors";
import {
  META_VALUE_TYPES,
  type EncodedMetaValue,
  type MetaJson,
  type MetaSequence,
  type MetaStructured,
  type MetaValue,
  type MetaValueType,
} from "./types";

const metaJsonSchema: z.ZodType<MetaJson> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(metaJsonSchema),
    z.record(metaJsonSchema),
  ]),
);

const sequenceSchema = z.array(metaJsonSchema);
const structuredSchema = z.record(metaJsonSchema);
const typeTagSchema = z.enum(META_VALUE_TYPES);

const INTEGER_TEXT = /^-?\d+$/;
const TRUE_TEXT = new Set(["true", "1"]);
const FALSE_TEXT = new Set(["false", "0", ""]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isMetaValueType(tag: string): tag is MetaValueType {
  return typeTagSchema.safeParse(tag).success;
}

/** Infers the stored tag for a value. Throws for anything outside the closed set. */
export function inferMetaValueType(value: unknown): MetaValueType {
  switch (typeof value) {
    case "string":
      return "string";
    case "boolean":
      return "boolean";
    case "number":
      if (!Number.isFinite(value)) {
        throw new UnsupportedMetaValue(`Non-finite number ${value} cannot be stored as a meta value`);
      }
      return Number.isSafeInteger(value) ? "integer" : "float";
    case "object":
      if (Array.isArray(value)) return "sequence";
      if (isPlainObject(value)) return "structured";
      break;
  }
  throw new UnsupportedMetaValue(`Values of kind ${describe(value)} cannot be stored as meta values`);
}

/** Narrows an arbitrary value to a storable meta value, or throws UnsupportedMetaValue. */
export function toMetaValue(value: unknown): MetaValue {
  const tag = inferMetaValueType(value);
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  const parsed = (tag === "sequence" ? sequenceSchema : structuredSchema).safeParse(value);
  if (!parsed.success) {
    throw new UnsupportedMetaValue(`Value is not JSON-serializable`);
  }
  return parsed.data;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

function serializeJson(value: unknown, schema: z.ZodTypeAny): string {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new UnsupportedMetaValue(`Value is not JSON-serializable${at}`);
  }
  return JSON.stringify(parsed.data);
}

/**
 * Serializes a value into its stored text and tag.
 *
 * Passing `type` pins the tag instead of inferring it; the value must be
 * compatible (an integer may be stored as `float`, nothing else widens).
 */
export function encodeMetaValue(value: MetaValue, type?: MetaValueType): EncodedMetaValue {
  const inferred = inferMetaValueType(value);
  const tag = type ?? inferred;

  if (tag !== inferred && !(tag === "float" && inferred === "integer")) {
    throw new UnsupportedMetaValue(`A ${inferred} value cannot be stored with type tag "${tag}"`);
  }

  switch (tag) {
    case "integer":
    case "float":
    case "boolean":
    case "string":
      return { text: String(value), type: tag };
    case "sequence":
      return { text: serializeJson(value, sequenceSchema), type: tag };
    case "structured":
      return { text: serializeJson(value, structuredSchema), type: tag };
  }
}

function parseJson(tag: MetaValueType, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new MetaDecodeError(tag, text);
  }
}

/** Restores a value from its stored text and tag. */
export function decodeMetaValue(text: string, tag: string): MetaValue {
  const parsedTag = typeTagSchema.safeParse(tag);
  if (!parsedTag.success) {
    throw new UnsupportedTypeTag(tag);
  }

  switch (parsedTag.data) {
    case "string":
      return text;
    case "integer": {
      const n = Number(text);
      if (!INTEGER_TEXT.test(text) || !Number.isSafeInteger(n)) throw new MetaDecodeError("integer", text);
      return n;
    }
    case "float": {
      const n = Number(text);
      if (text.trim() === "" || !Number.isFinite(n)) throw new MetaDecodeError("float", text);
      return n;
    }
    case "boolean":
      if (TRUE_TEXT.has(text)) return true;
      if (FALSE_TEXT.has(text)) return false;
      throw new MetaDecodeError("boolean", text);
    case "sequence": {
      const parsed = sequenceSchema.safeParse(parseJson("sequence", text));
      if (!parsed.success) throw new MetaDecodeError("sequence", text);
      const sequence: MetaSequence = parsed.data;
      return sequence;
    }
    case "structured": {
      const parsed = structuredSchema.safeParse(parseJson("structured", text));
      if (!parsed.success) throw new MetaDecodeError("structured", text);
      const structured: MetaStructured = parsed.data;
      return structured;
    }
  }
}
