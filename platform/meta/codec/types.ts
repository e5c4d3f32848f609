/**
 * Closed set of value kinds a meta attribute can hold.
 *
 * The tag is persisted next to the serialized text so that decoding restores
 * the original kind (a numeric string stays a string, a number stays a number).
 */
export const META_VALUE_TYPES = [
  "integer",
  "float",
  "boolean",
  "string",
  "sequence",
  "structured",
] as const;

export type MetaValueType = (typeof META_VALUE_TYPES)[number];

export type MetaScalar = string | number | boolean;

export type MetaJson = MetaScalar | null | MetaJson[] | { [key: string]: MetaJson };

export type MetaSequence = MetaJson[];

export type MetaStructured = { [key: string]: MetaJson };

export type MetaValue = MetaScalar | MetaSequence | MetaStructured;

export type EncodedMetaValue = Readonly<{
  text: string;
  type: MetaValueType;
}>;
