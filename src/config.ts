import os from "node:os"

export const DEFAULT_VCS_DIR = ".minivcs"
export const DEFAULT_BRANCH = "main"

export type VcsConfig = {
    vcsDir: string // Repository directory name under the working dir
    author: string
    defaultBranch: string
    debug: boolean
}

type Env = Record<string, string | undefined>

function systemUserName(): string | undefined {
    try {
        return os.userInfo().username || undefined
    } catch {
        // No passwd entry for the current uid
        return undefined
    }
}

function isTruthy(value: string | undefined): boolean {
    if (!value) return false
    return !["0", "false", "no", "off"].includes(value.trim().toLowerCase())
}

export function loadConfig(env: Env = process.env): VcsConfig {
    return {
        vcsDir: env.MINIVCS_DIR || DEFAULT_VCS_DIR,
        author: env.MINIVCS_AUTHOR || systemUserName() || "unknown",
        defaultBranch: DEFAULT_BRANCH,
        debug: isTruthy(env.MINIVCS_DEBUG),
    }
}
