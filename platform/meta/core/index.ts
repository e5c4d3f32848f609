export { createDevMetaOverlay, createMetaStack, type MetaStack } from "./createMetaOverlay";
