export * from "./tags.js";
export * from "./tlv.js";
export * from "./codec.js";
export * from "./builder.js";
