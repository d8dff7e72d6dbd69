export * from "./types.js";
export * from "./file.js";
export * from "./fs-storage-provider.js";
