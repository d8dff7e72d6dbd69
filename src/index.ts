export * from "./storage/index.js"
export * from "./vcs/index.js"
export * from "./config.js"
export * from "./logger.js"
export * from "./commands.js"
