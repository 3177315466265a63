export * from "./crypto/index.js";
export * from "./protocol/index.js";
export * from "./middleware/index.js";
export * from "./utils/index.js";
export * from "./db/index.js";
