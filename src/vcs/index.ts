export * from "./types.js"
export * from "./errors.js"
export * from "./objects.js"
export * from "./layout.js"
export * from "./object-store.js"
export * from "./staging-index.js"
export * from "./refs.js"
export * from "./commit-graph.js"
export * from "./worktree.js"
export * from "./repository.js"
