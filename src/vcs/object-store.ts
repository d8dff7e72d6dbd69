import {IStorageProvider} from "../storage/index.js"
import {buildLogger} from "../logger.js"
import {CorruptedObjectError, ObjectNotFoundError} from "./errors.js"
import {RepositoryLayout} from "./layout.js"
import {deserializeObject, frameObject, hashFramed, serializeObject, unframeObject} from "./objects.js"
import {BlobObject, CommitObject, Digest, ObjectKind, RawObject, TreeObject, VcsObject} from "./types.js"

const log = buildLogger("object-store")

/**
 * Append-only, content-addressed object storage. One file per object under
 * `objects/`, named by the digest of its framed bytes.
 */
export class ObjectStore {
    constructor(private readonly sp: IStorageProvider, private readonly layout: RepositoryLayout) {
    }

    /** Stores the object unless it already exists; either way returns its digest. */
    async put(kind: ObjectKind, payload: Buffer): Promise<Digest> {
        const framed = frameObject(kind, payload)
        const digest = hashFramed(framed)
        const objectPath = this.layout.objectPath(digest)

        if (await this.sp.exists(objectPath)) {
            log.dbg(`${kind} ${digest} already stored`)
            return digest
        }

        await this.sp.writeFileAtomic(objectPath, framed)
        log.dbg(`stored ${kind} ${digest} (${payload.length} bytes)`)
        return digest
    }

    async has(digest: Digest): Promise<boolean> {
        return await this.sp.isFile(this.layout.objectPath(digest))
    }

    async get(digest: Digest): Promise<RawObject> {
        const objectPath = this.layout.objectPath(digest)
        if (!await this.sp.isFile(objectPath)) {
            throw new ObjectNotFoundError(digest)
        }

        const framed = await (await this.sp.readFile(objectPath)).readData()
        if (hashFramed(framed) !== digest) {
            throw new CorruptedObjectError(digest, "content does not match its digest")
        }
        return unframeObject(digest, framed)
    }

    async putObject(object: VcsObject): Promise<Digest> {
        const {kind, payload} = serializeObject(object)
        return await this.put(kind, payload)
    }

    async getObject(digest: Digest): Promise<VcsObject> {
        return deserializeObject(digest, await this.get(digest))
    }

    async getBlob(digest: Digest): Promise<BlobObject> {
        const object = await this.getObject(digest)
        if (object.kind !== "blob") {
            throw new CorruptedObjectError(digest, `expected a blob, found a ${object.kind}`)
        }
        return object
    }

    async getTree(digest: Digest): Promise<TreeObject> {
        const object = await this.getObject(digest)
        if (object.kind !== "tree") {
            throw new CorruptedObjectError(digest, `expected a tree, found a ${object.kind}`)
        }
        return object
    }

    async getCommit(digest: Digest): Promise<CommitObject> {
        const object = await this.getObject(digest)
        if (object.kind !== "commit") {
            throw new CorruptedObjectError(digest, `expected a commit, found a ${object.kind}`)
        }
        return object
    }
}
