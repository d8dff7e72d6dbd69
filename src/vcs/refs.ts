import {IStorageProvider} from "../storage/index.js"
import {buildLogger} from "../logger.js"
import {
    AlreadyExistsError,
    CorruptedStateError,
    InvalidRefNameError,
    NoCommitsYetError,
    RefNotFoundError,
} from "./errors.js"
import {HEADS_PREFIX, RepositoryLayout} from "./layout.js"
import {ObjectStore} from "./object-store.js"
import {BranchInfo, Digest, HeadState, isDigest} from "./types.js"

const log = buildLogger("refs")

const BRANCH_NAME_PATTERN = /^[A-Za-z0-9._-]+$/

export function isValidBranchName(name: string): boolean {
    return BRANCH_NAME_PATTERN.test(name) && !name.startsWith(".") && name !== "HEAD"
}

export class ReferenceStore {
    constructor(
        private readonly sp: IStorageProvider,
        private readonly layout: RepositoryLayout,
        private readonly objects: ObjectStore
    ) {
    }

    async readHead(): Promise<HeadState> {
        if (!await this.sp.isFile(this.layout.headFile)) {
            throw new CorruptedStateError("HEAD is missing")
        }

        const head = (await (await this.sp.readFile(this.layout.headFile)).readText()).trim()
        if (head.startsWith(HEADS_PREFIX)) {
            const branch = head.slice(HEADS_PREFIX.length)
            if (!isValidBranchName(branch)) {
                throw new CorruptedStateError(`HEAD points to an invalid branch "${branch}"`)
            }
            return {type: "symbolic", branch}
        }
        if (isDigest(head)) {
            return {type: "detached", digest: head}
        }
        throw new CorruptedStateError(`HEAD holds "${head}"`)
    }

    async currentCommit(): Promise<Digest | undefined> {
        const head = await this.readHead()
        return head.type === "symbolic" ? await this.readBranchTip(head.branch) : head.digest
    }

    async branchExists(name: string): Promise<boolean> {
        return isValidBranchName(name) && await this.sp.isFile(this.layout.branchPath(name))
    }

    /** Undefined when the branch is missing or has no commits yet. */
    async readBranchTip(name: string): Promise<Digest | undefined> {
        if (!await this.branchExists(name)) {
            return undefined
        }

        const tip = (await (await this.sp.readFile(this.layout.branchPath(name))).readText()).trim()
        if (!tip) {
            return undefined
        }
        if (!isDigest(tip)) {
            throw new CorruptedStateError(`branch ${name} holds "${tip}"`)
        }
        return tip
    }

    async setBranchTip(name: string, digest: Digest): Promise<void> {
        this.throwIfInvalidName(name)
        await this.sp.writeFileAtomic(this.layout.branchPath(name), Buffer.from(digest))
        log.dbg(`${name} -> ${digest}`)
    }

    async createEmptyBranch(name: string): Promise<void> {
        this.throwIfInvalidName(name)
        await this.sp.writeFileAtomic(this.layout.branchPath(name), Buffer.alloc(0))
    }

    async createBranch(name: string, startDigest: Digest | undefined): Promise<Digest> {
        if (!startDigest) {
            throw new NoCommitsYetError()
        }
        this.throwIfInvalidName(name)
        if (await this.branchExists(name)) {
            throw new AlreadyExistsError(name)
        }
        await this.setBranchTip(name, startDigest)
        return startDigest
    }

    async listBranches(): Promise<BranchInfo[]> {
        const head = await this.readHead()
        const current = head.type === "symbolic" ? head.branch : undefined

        const names = (await this.sp.readDir(this.layout.headsDir))
            .filter(isValidBranchName)
            .sort()

        const branches: BranchInfo[] = []
        for (const name of names) {
            if (!await this.branchExists(name)) continue
            branches.push({name, tip: await this.readBranchTip(name), current: name === current})
        }
        return branches
    }

    async pointHeadToBranch(name: string): Promise<void> {
        this.throwIfInvalidName(name)
        await this.sp.writeFileAtomic(this.layout.headFile, Buffer.from(`${HEADS_PREFIX}${name}`))
        log.dbg(`HEAD -> ${HEADS_PREFIX}${name}`)
    }

    async detachHeadTo(digest: Digest): Promise<void> {
        await this.sp.writeFileAtomic(this.layout.headFile, Buffer.from(digest))
        log.dbg(`HEAD -> ${digest} (detached)`)
    }

    /** The existing branch `ref` names, either bare or as `refs/heads/<name>`. */
    async branchNamed(ref: string): Promise<string | undefined> {
        const name = ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref
        return await this.branchExists(name) ? name : undefined
    }

    /** Resolves `HEAD`, `refs/heads/<name>`, a branch name or a stored digest, in that order. */
    async resolve(ref: string): Promise<Digest> {
        let resolved: Digest | undefined
        if (ref === "HEAD") {
            resolved = await this.currentCommit()
        } else if (ref.startsWith(HEADS_PREFIX)) {
            resolved = await this.readBranchTip(ref.slice(HEADS_PREFIX.length))
        } else if (await this.branchExists(ref)) {
            resolved = await this.readBranchTip(ref)
        } else if (isDigest(ref) && await this.objects.has(ref)) {
            resolved = ref
        }

        if (!resolved) {
            throw new RefNotFoundError(ref)
        }
        return resolved
    }

    private throwIfInvalidName(name: string) {
        if (!isValidBranchName(name)) {
            throw new InvalidRefNameError(name)
        }
    }
}
