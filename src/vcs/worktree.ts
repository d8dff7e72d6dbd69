import path from "node:path"
import {IStorageProvider} from "../storage/index.js"
import {buildLogger} from "../logger.js"
import {CommitGraph} from "./commit-graph.js"
import {RepositoryLayout} from "./layout.js"
import {ObjectStore} from "./object-store.js"
import {computeDigest} from "./objects.js"
import {ReferenceStore} from "./refs.js"
import {StagingIndex} from "./staging-index.js"
import {CheckoutResult, Status} from "./types.js"

const log = buildLogger("worktree")

/** Reads and writes the working directory against commits and the index. */
export class Worktree {
    constructor(
        private readonly sp: IStorageProvider,
        private readonly layout: RepositoryLayout,
        private readonly objects: ObjectStore,
        private readonly refs: ReferenceStore,
        private readonly index: StagingIndex,
        private readonly graph: CommitGraph
    ) {
    }

    /**
     * Overwrites every file of the target commit's tree in the working
     * directory. Files the tree does not list are left as they are, so
     * switching away from a branch never deletes anything.
     */
    async checkout(targetRef: string, detach: boolean): Promise<CheckoutResult> {
        const commit = await this.refs.resolve(targetRef)
        const tree = await this.graph.resolveTreeMap(commit)
        if (tree.size === 0) {
            return {commit, restored: [], empty: true}
        }

        const restored: string[] = []
        for (const [repoPath, blobDigest] of tree) {
            const blob = await this.objects.getBlob(blobDigest)
            await this.sp.createFile(this.layout.workingPath(repoPath), blob.data)
            restored.push(repoPath)
        }
        log.dbg(`restored ${restored.length} files from ${commit}`)

        if (detach) {
            await this.refs.detachHeadTo(commit)
        }
        return {commit, restored, empty: false}
    }

    async status(): Promise<Status> {
        const staged = await this.index.readAll()
        const stagedDigests = new Map(staged.map(e => [e.path, e.digest]))
        const headTree = await this.graph.resolveTreeMap(await this.refs.currentCommit())

        const modified: string[] = []
        for (const repoPath of await this.listWorkingFiles()) {
            // Neither staged nor committed: untracked, never reported
            const expected = stagedDigests.get(repoPath) ?? headTree.get(repoPath)
            if (!expected) continue

            const file = await this.sp.readFile(this.workingFilePath(repoPath))
            if (computeDigest("blob", await file.readData()) !== expected) {
                modified.push(repoPath)
            }
        }

        return {staged, modified}
    }

    /** Repository-relative paths of every regular file outside the repository directory, sorted. */
    async listWorkingFiles(): Promise<string[]> {
        const vcsDir = this.layout.vcsDirName
        const candidates = await this.sp.readDirDeep(this.layout.workingDir, [vcsDir, `${vcsDir}/**`])

        const files: string[] = []
        for (const candidate of candidates) {
            if (await this.sp.isFile(this.workingFilePath(candidate))) {
                files.push(candidate)
            }
        }
        return files.sort()
    }

    private workingFilePath(repoPath: string): string {
        return path.join(this.layout.workingDir, ...repoPath.split("/"))
    }
}
