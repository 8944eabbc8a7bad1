export * from "./types.js";
export * from "./message.js";
export * from "./response.js";
export * from "./codec.js";
