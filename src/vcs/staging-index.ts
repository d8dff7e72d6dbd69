import {IStorageProvider} from "../storage/index.js"
import {buildLogger} from "../logger.js"
import {RepositoryLayout} from "./layout.js"
import {ObjectStore} from "./object-store.js"
import {Digest, IndexEntry, isDigest} from "./types.js"

const log = buildLogger("index")

export function parseIndex(text: string): IndexEntry[] {
    const entries: IndexEntry[] = []
    for (const line of text.split("\n")) {
        const tab = line.indexOf("\t")
        if (tab <= 0) continue

        const digest = line.slice(tab + 1).trim()
        if (!isDigest(digest)) continue

        entries.push({path: line.slice(0, tab), digest})
    }
    return entries
}

export function serializeIndex(entries: IndexEntry[]): string {
    return entries.map(e => `${e.path}\t${e.digest}\n`).join("")
}

/** The staging area: path to blob digest, in the order paths were first staged. */
export class StagingIndex {
    constructor(
        private readonly sp: IStorageProvider,
        private readonly layout: RepositoryLayout,
        private readonly objects: ObjectStore
    ) {
    }

    async readAll(): Promise<IndexEntry[]> {
        if (!await this.sp.isFile(this.layout.indexFile)) {
            return []
        }
        const indexFile = await this.sp.readFile(this.layout.indexFile)
        return parseIndex(await indexFile.readText())
    }

    /** Stores the blob and records it under `path`, which must map into the working directory. */
    async stage(path: string, content: Buffer): Promise<Digest> {
        const repoPath = this.layout.toRepoPath(path)
        const digest = await this.objects.put("blob", content)

        // Map.set on an existing key keeps its position
        const entries = new Map((await this.readAll()).map(e => [e.path, e.digest]))
        entries.set(repoPath, digest)
        await this.write([...entries].map(([path, digest]) => ({path, digest})))

        return digest
    }

    async clear(): Promise<void> {
        await this.write([])
    }

    private async write(entries: IndexEntry[]): Promise<void> {
        await this.sp.writeFileAtomic(this.layout.indexFile, Buffer.from(serializeIndex(entries), "utf8"))
        log.dbg(`wrote ${entries.length} entries`)
    }
}
