export * from "./types.js";
export * from "./result.js";
export * from "./reply.js";
export * from "./validation.js";
export * from "./env.js";
