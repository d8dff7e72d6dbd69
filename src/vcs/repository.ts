import {IStorageProvider} from "../storage/index.js"
import {loadConfig, VcsConfig} from "../config.js"
import {CommitGraph} from "./commit-graph.js"
import {FileNotFoundError, RefNotFoundError, RepositoryNotFoundError} from "./errors.js"
import {RepositoryLayout} from "./layout.js"
import {ObjectStore} from "./object-store.js"
import {ReferenceStore} from "./refs.js"
import {StagingIndex} from "./staging-index.js"
import {Worktree} from "./worktree.js"
import {
    BranchInfo,
    CheckoutOutcome,
    CommitRecord,
    Digest,
    HeadState,
    IndexEntry,
    ShowResult,
    Status,
} from "./types.js"

type SwitchOutcome = Extract<CheckoutOutcome, { type: "branch" }>

/**
 * Handle on one repository: its working directory, the storage provider all
 * I/O goes through, and the components built on top of them.
 */
export class Repository {
    readonly sp: IStorageProvider
    readonly config: VcsConfig
    readonly layout: RepositoryLayout
    readonly objects: ObjectStore
    readonly index: StagingIndex
    readonly refs: ReferenceStore
    readonly graph: CommitGraph
    readonly worktree: Worktree

    private constructor(sp: IStorageProvider, workingDir: string, config: VcsConfig) {
        this.sp = sp
        this.config = config
        this.layout = new RepositoryLayout(workingDir, config.vcsDir)
        this.objects = new ObjectStore(sp, this.layout)
        this.index = new StagingIndex(sp, this.layout, this.objects)
        this.refs = new ReferenceStore(sp, this.layout, this.objects)
        this.graph = new CommitGraph(this.objects, this.refs, this.index)
        this.worktree = new Worktree(sp, this.layout, this.objects, this.refs, this.index, this.graph)
    }

    /** Creates an empty repository; `created` is false when one already exists. */
    static async init(
        sp: IStorageProvider,
        workingDir: string,
        config: VcsConfig = loadConfig()
    ): Promise<{ repository: Repository, created: boolean }> {
        const repository = new Repository(sp, workingDir, config)
        const {layout} = repository

        if (await sp.exists(layout.root)) {
            return {repository, created: false}
        }

        await sp.createDir(layout.objectsDir)
        await sp.createDir(layout.headsDir)
        await repository.refs.createEmptyBranch(config.defaultBranch)
        await repository.refs.pointHeadToBranch(config.defaultBranch)
        await repository.index.clear()

        return {repository, created: true}
    }

    static async open(sp: IStorageProvider, workingDir: string, config: VcsConfig = loadConfig()): Promise<Repository> {
        const repository = new Repository(sp, workingDir, config)
        if (!await sp.isDir(repository.layout.root)) {
            throw new RepositoryNotFoundError(repository.layout.workingDir)
        }
        // Fails fast with CorruptedState when HEAD is gone
        await repository.refs.readHead()
        return repository
    }

    async add(filePath: string): Promise<IndexEntry> {
        const repoPath = this.layout.toRepoPath(filePath)
        const fullPath = this.layout.workingPath(repoPath)
        if (!await this.sp.isFile(fullPath)) {
            throw new FileNotFoundError(filePath)
        }

        const content = await (await this.sp.readFile(fullPath)).readData()
        const digest = await this.index.stage(repoPath, content)
        return {path: repoPath, digest}
    }

    async commit(message: string, author: string = this.config.author): Promise<Digest> {
        return await this.graph.commit(await this.index.readAll(), message, author)
    }

    async status(): Promise<Status> {
        return await this.worktree.status()
    }

    async head(): Promise<HeadState> {
        return await this.refs.readHead()
    }

    async currentCommit(): Promise<Digest | undefined> {
        return await this.refs.currentCommit()
    }

    async log(): Promise<CommitRecord[]> {
        const history: CommitRecord[] = []
        for await (const record of this.graph.walkAncestry(await this.refs.currentCommit())) {
            history.push(record)
        }
        return history
    }

    /**
     * Branch names switch to the branch; anything else detaches HEAD at the
     * resolved commit. A branch without commits resolves to nothing.
     */
    async checkout(ref: string): Promise<CheckoutOutcome> {
        const branch = await this.refs.branchNamed(ref)
        if (branch) {
            if (!await this.refs.readBranchTip(branch)) {
                throw new RefNotFoundError(ref)
            }
            return await this.switchBranch(branch)
        }
        return {type: "detached", checkout: await this.worktree.checkout(ref, true)}
    }

    async switchBranch(name: string): Promise<SwitchOutcome> {
        if (!await this.refs.branchExists(name)) {
            throw new RefNotFoundError(name)
        }

        const tip = await this.refs.readBranchTip(name)
        const checkout = tip ? await this.worktree.checkout(tip, false) : undefined
        await this.refs.pointHeadToBranch(name)
        return {type: "branch", branch: name, checkout}
    }

    async createBranch(name: string): Promise<Digest> {
        return await this.refs.createBranch(name, await this.refs.currentCommit())
    }

    async listBranches(): Promise<BranchInfo[]> {
        return await this.refs.listBranches()
    }

    async show(ref: string): Promise<ShowResult> {
        const digest = await this.refs.resolve(ref)
        const {kind, payload} = await this.objects.get(digest)
        return {digest, kind, size: payload.length, payload}
    }
}
