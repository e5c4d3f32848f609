export * from "./types";
export { decodeMetaValue, encodeMetaValue, inferMetaValueType, isMetaValueType, toMetaValue } from "./typeCodec";
