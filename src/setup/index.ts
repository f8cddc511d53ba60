export * from "./workspace-setup.js";
export * from "./download.js";
export * from "./download-configs.js";
export * from "./paths.js";
export * from "./templates.js";
