export type Digest = string & { readonly __brand: "Digest" } // SHA-1, 40 lowercase hex chars

const DIGEST_PATTERN = /^[0-9a-f]{40}$/

export function isDigest(value: string): value is Digest {
    return DIGEST_PATTERN.test(value)
}

export const OBJECT_KINDS = ["blob", "tree", "commit"] as const

export type ObjectKind = typeof OBJECT_KINDS[number]

export function isObjectKind(value: string): value is ObjectKind {
    return OBJECT_KINDS.some(kind => kind === value)
}

export type RawObject = {
    kind: ObjectKind
    payload: Buffer
}

export type TreeEntry = {
    path: string // Repository-relative, "/" separated
    digest: Digest // Blob digest
}

export type IndexEntry = TreeEntry

export type TreeMap = Map<string, Digest>

export type BlobObject = {
    kind: "blob"
    data: Buffer
}

export type TreeObject = {
    kind: "tree"
    entries: TreeEntry[]
}

export type CommitObject = {
    kind: "commit"
    tree: Digest
    parent?: Digest // Absent for the first commit of a history
    author: string
    timestamp: string // ISO-8601
    message: string
}

export type VcsObject = BlobObject | TreeObject | CommitObject

export type CommitRecord = {
    digest: Digest
    commit: CommitObject
}

export type HeadState =
    | { type: "symbolic", branch: string }
    | { type: "detached", digest: Digest }

export type BranchInfo = {
    name: string
    tip?: Digest // Absent while the branch has no commits
    current: boolean
}

export type Status = {
    staged: IndexEntry[]
    modified: string[] // Working files differing from the index, or from HEAD when unstaged
}

export type CheckoutResult = {
    commit: Digest
    restored: string[]
    empty: boolean
}

export type CheckoutOutcome =
    | { type: "detached", checkout: CheckoutResult }
    | { type: "branch", branch: string, checkout?: CheckoutResult }

export type ShowResult = {
    digest: Digest
    kind: ObjectKind
    size: number
    payload: Buffer
}
