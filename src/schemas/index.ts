export * from "./message.js";
export * from "./task.js";
export * from "./config.js";
export * from "./event.js";
