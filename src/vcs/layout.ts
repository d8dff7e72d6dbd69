import path from "node:path"
import {DEFAULT_VCS_DIR} from "../config.js"
import {InvalidPathError} from "./errors.js"
import {Digest} from "./types.js"

export const OBJECTS_DIR = "objects"
export const HEADS_DIR = path.join("refs", "heads")
export const HEAD_FILE = "HEAD"
export const INDEX_FILE = "index"

export const HEADS_PREFIX = "refs/heads/"

/**
 * Absolute locations of everything a repository keeps on disk, plus the
 * mapping between working-directory paths and the repository-relative,
 * "/"-separated paths stored in the index and in trees.
 */
export class RepositoryLayout {
    readonly workingDir: string
    readonly vcsDirName: string
    readonly root: string

    constructor(workingDir: string, vcsDirName: string = DEFAULT_VCS_DIR) {
        this.workingDir = path.resolve(workingDir)
        this.vcsDirName = vcsDirName
        this.root = path.join(this.workingDir, vcsDirName)
    }

    get objectsDir(): string {
        return path.join(this.root, OBJECTS_DIR)
    }

    get headsDir(): string {
        return path.join(this.root, HEADS_DIR)
    }

    get headFile(): string {
        return path.join(this.root, HEAD_FILE)
    }

    get indexFile(): string {
        return path.join(this.root, INDEX_FILE)
    }

    objectPath(digest: Digest): string {
        return path.join(this.objectsDir, digest)
    }

    branchPath(name: string): string {
        return path.join(this.headsDir, name)
    }

    toRepoPath(input: string): string {
        const absolute = path.resolve(this.workingDir, input)
        const relative = path.relative(this.workingDir, absolute)
        if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
            throw new InvalidPathError(input, "outside the repository")
        }

        const repoPath = relative.split(path.sep).join("/")
        if (repoPath === this.vcsDirName || repoPath.startsWith(`${this.vcsDirName}/`)) {
            throw new InvalidPathError(input, "inside the repository directory")
        }
        if (/[\t\r\n]/.test(repoPath)) {
            throw new InvalidPathError(input, "tabs and line breaks are not supported")
        }
        return repoPath
    }

    workingPath(repoPath: string): string {
        return path.join(this.workingDir, ...this.toRepoPath(repoPath).split("/"))
    }
}
