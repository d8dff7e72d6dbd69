import {buildLogger} from "../logger.js"
import {NothingStagedError, VcsError} from "./errors.js"
import {ObjectStore} from "./object-store.js"
import {ReferenceStore} from "./refs.js"
import {StagingIndex} from "./staging-index.js"
import {CommitObject, CommitRecord, Digest, IndexEntry, TreeMap} from "./types.js"

const log = buildLogger("commit-graph")

export class CommitGraph {
    constructor(
        private readonly objects: ObjectStore,
        private readonly refs: ReferenceStore,
        private readonly index: StagingIndex
    ) {
    }

    /**
     * Snapshots the staged entries into a tree, records a commit on top of the
     * current one and advances HEAD's branch to it. A detached HEAD is left
     * where it is, so the new commit is stored without any ref naming it.
     *
     * Not transactional: objects are written first, then the ref, then the
     * index is cleared. Re-running after a partial failure is safe because
     * object writes are idempotent.
     */
    async commit(stagedEntries: IndexEntry[], message: string, author: string): Promise<Digest> {
        if (stagedEntries.length === 0) {
            throw new NothingStagedError()
        }

        const tree = await this.objects.putObject({kind: "tree", entries: stagedEntries})
        const head = await this.refs.readHead()
        const parent = head.type === "symbolic" ? await this.refs.readBranchTip(head.branch) : head.digest

        const commit: CommitObject = {
            kind: "commit",
            tree,
            parent,
            author: author.replace(/[\r\n]+/g, " "),
            timestamp: new Date().toISOString(),
            message,
        }
        const digest = await this.objects.putObject(commit)

        if (head.type === "symbolic") {
            await this.refs.setBranchTip(head.branch, digest)
        }

        await this.index.clear()
        return digest
    }

    async readCommit(digest: Digest): Promise<CommitObject> {
        return await this.objects.getCommit(digest)
    }

    /** Path to blob digest for the commit's tree; empty when there is nothing to read. */
    async resolveTreeMap(commitDigest: Digest | undefined): Promise<TreeMap> {
        if (!commitDigest) {
            return new Map()
        }

        try {
            const commit = await this.objects.getCommit(commitDigest)
            const tree = await this.objects.getTree(commit.tree)
            return new Map(tree.entries.map(e => [e.path, e.digest]))
        } catch (err) {
            if (err instanceof VcsError && !err.fatal) {
                log.dbg(`no tree for ${commitDigest}: ${err.message}`)
                return new Map()
            }
            throw err
        }
    }

    /**
     * Yields the commit at `startDigest` and then each parent in turn. Stops
     * after a root commit, or before the first commit that cannot be read.
     */
    async* walkAncestry(startDigest: Digest | undefined): AsyncGenerator<CommitRecord> {
        let current = startDigest
        while (current) {
            let commit: CommitObject
            try {
                commit = await this.readCommit(current)
            } catch (err) {
                if (err instanceof VcsError && !err.fatal) {
                    log.dbg(`history ends at ${current}: ${err.message}`)
                    return
                }
                throw err
            }

            yield {digest: current, commit}
            current = commit.parent
        }
    }
}
