export * from "./marked-block.js";
export * from "./block-updater.js";
