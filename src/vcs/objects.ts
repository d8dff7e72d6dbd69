import {createHash} from "crypto"
import {CorruptedObjectError} from "./errors.js"
import {
    CommitObject,
    Digest,
    isDigest,
    isObjectKind,
    ObjectKind,
    RawObject,
    TreeEntry,
    VcsObject,
} from "./types.js"

export const HASH_ALGORITHM = "sha1"

/** `"<kind> <byte length>\0<payload>"`, the exact bytes that are hashed and stored. */
export function frameObject(kind: ObjectKind, payload: Buffer): Buffer {
    return Buffer.concat([Buffer.from(`${kind} ${payload.length}\0`, "utf8"), payload])
}

export function unframeObject(digest: string, framed: Buffer): RawObject {
    const nul = framed.indexOf(0)
    if (nul === -1) {
        throw new CorruptedObjectError(digest, "missing header terminator")
    }

    const header = framed.subarray(0, nul).toString("utf8")
    const space = header.indexOf(" ")
    const kind = space === -1 ? header : header.slice(0, space)
    const sizeText = space === -1 ? "" : header.slice(space + 1)
    if (!isObjectKind(kind)) {
        throw new CorruptedObjectError(digest, `unknown object kind "${kind}"`)
    }
    if (!/^\d+$/.test(sizeText)) {
        throw new CorruptedObjectError(digest, `invalid size "${sizeText}"`)
    }

    const payload = framed.subarray(nul + 1)
    if (payload.length !== Number(sizeText)) {
        throw new CorruptedObjectError(digest, `expected ${sizeText} bytes, found ${payload.length}`)
    }
    return {kind, payload}
}

export function hashFramed(framed: Buffer): Digest {
    const hex = createHash(HASH_ALGORITHM).update(framed).digest("hex")
    if (!isDigest(hex)) {
        throw new Error(`Unexpected ${HASH_ALGORITHM} output: ${hex}`)
    }
    return hex
}

export function computeDigest(kind: ObjectKind, payload: Buffer): Digest {
    return hashFramed(frameObject(kind, payload))
}

export function serializeTree(entries: TreeEntry[]): Buffer {
    return Buffer.from(entries.map(e => `${e.path}\t${e.digest}\n`).join(""), "utf8")
}

export function parseTree(digest: string, payload: Buffer): TreeEntry[] {
    const entries: TreeEntry[] = []
    for (const line of payload.toString("utf8").split("\n")) {
        if (line === "") continue

        const tab = line.indexOf("\t")
        const blob = line.slice(tab + 1)
        if (tab <= 0 || !isDigest(blob)) {
            throw new CorruptedObjectError(digest, `bad tree line "${line}"`)
        }
        entries.push({path: line.slice(0, tab), digest: blob})
    }
    return entries
}

export function serializeCommit(commit: CommitObject): Buffer {
    let header = `tree ${commit.tree}\n`
    if (commit.parent) {
        header += `parent ${commit.parent}\n`
    }
    header += `author ${commit.author} ${commit.timestamp}\n`
    return Buffer.from(`${header}\n${commit.message}\n`, "utf8")
}

export function parseCommit(digest: string, payload: Buffer): CommitObject {
    const text = payload.toString("utf8")
    const separator = text.indexOf("\n\n")
    if (separator === -1) {
        throw new CorruptedObjectError(digest, "commit has no message separator")
    }

    let tree: Digest | undefined
    let parent: Digest | undefined
    let author: string | undefined
    let timestamp = ""

    for (const line of text.slice(0, separator).split("\n")) {
        const space = line.indexOf(" ")
        const field = space === -1 ? line : line.slice(0, space)
        const value = space === -1 ? "" : line.slice(space + 1)

        switch (field) {
            case "tree":
            case "parent":
                if (!isDigest(value)) {
                    throw new CorruptedObjectError(digest, `bad ${field} digest "${value}"`)
                }
                if (field === "tree") tree = value
                else parent = value
                break
            case "author": {
                // Author names may contain spaces, timestamps never do
                const lastSpace = value.lastIndexOf(" ")
                author = lastSpace === -1 ? value : value.slice(0, lastSpace)
                timestamp = lastSpace === -1 ? "" : value.slice(lastSpace + 1)
                break
            }
            default:
                throw new CorruptedObjectError(digest, `unknown commit field "${field}"`)
        }
    }

    if (!tree) {
        throw new CorruptedObjectError(digest, "commit has no tree")
    }

    let message = text.slice(separator + 2)
    if (message.endsWith("\n")) {
        message = message.slice(0, -1)
    }

    return {kind: "commit", tree, parent, author: author ?? "unknown", timestamp, message}
}

export function serializeObject(object: VcsObject): RawObject {
    switch (object.kind) {
        case "blob":
            return {kind: "blob", payload: object.data}
        case "tree":
            return {kind: "tree", payload: serializeTree(object.entries)}
        case "commit":
            return {kind: "commit", payload: serializeCommit(object)}
    }
}

export function deserializeObject(digest: string, raw: RawObject): VcsObject {
    switch (raw.kind) {
        case "blob":
            return {kind: "blob", data: raw.payload}
        case "tree":
            return {kind: "tree", entries: parseTree(digest, raw.payload)}
        case "commit":
            return parseCommit(digest, raw.payload)
    }
}
