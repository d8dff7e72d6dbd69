export type VcsErrorKind =
    | "RepositoryNotFound"
    | "CorruptedState"
    | "RefNotFound"
    | "ObjectNotFound"
    | "CorruptedObject"
    | "FileNotFound"
    | "InvalidPath"
    | "NothingStaged"
    | "AlreadyExists"
    | "NoCommitsYet"
    | "InvalidRefName"

/**
 * Base class of every domain error.
 *
 * Fatal errors abort the command; the others are reported to the user and
 * leave the repository untouched.
 */
export class VcsError extends Error {
    constructor(
        readonly kind: VcsErrorKind,
        message: string,
        readonly fatal: boolean = false
    ) {
        super(message)
        this.name = `${kind}Error`
    }
}

export class RepositoryNotFoundError extends VcsError {
    constructor(readonly root: string) {
        super("RepositoryNotFound", `Not a repository: ${root} (run 'init' first)`, true)
    }
}

export class CorruptedStateError extends VcsError {
    constructor(detail: string) {
        super("CorruptedState", `Repository state is corrupted: ${detail}`, true)
    }
}

export class RefNotFoundError extends VcsError {
    constructor(readonly ref: string) {
        super("RefNotFound", `Commit/ref not found: ${ref}`)
    }
}

export class ObjectNotFoundError extends VcsError {
    constructor(readonly digest: string) {
        super("ObjectNotFound", `Object not found: ${digest}`)
    }
}

export class CorruptedObjectError extends VcsError {
    constructor(readonly digest: string, detail: string) {
        super("CorruptedObject", `Object ${digest} is malformed: ${detail}`)
    }
}

export class FileNotFoundError extends VcsError {
    constructor(readonly path: string) {
        super("FileNotFound", `File not found: ${path}`)
    }
}

export class InvalidPathError extends VcsError {
    constructor(readonly path: string, reason: string) {
        super("InvalidPath", `Invalid path ${JSON.stringify(path)}: ${reason}`)
    }
}

export class NothingStagedError extends VcsError {
    constructor() {
        super("NothingStaged", "Nothing staged to commit.")
    }
}

export class AlreadyExistsError extends VcsError {
    constructor(readonly branch: string) {
        super("AlreadyExists", `Branch already exists: ${branch}`)
    }
}

export class NoCommitsYetError extends VcsError {
    constructor() {
        super("NoCommitsYet", "No commits yet; create a commit first.")
    }
}

export class InvalidRefNameError extends VcsError {
    constructor(readonly branch: string) {
        super("InvalidRefName", `Invalid branch name: ${JSON.stringify(branch)}`)
    }
}
