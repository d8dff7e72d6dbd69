import {IStorageProvider} from "./storage/index.js"
import {VcsConfig} from "./config.js"
import {buildLogger} from "./logger.js"
import {VcsError} from "./vcs/errors.js"
import {Repository} from "./vcs/repository.js"
import {CheckoutResult} from "./vcs/types.js"

const log = buildLogger("minivcs")

export const USAGE = [
    "minivcs - commands:",
    "  init",
    "  add <file>",
    "  commit -m \"message\"",
    "  status",
    "  log",
    "  checkout <hash|ref>",
    "  branch <name>",
    "  branches",
    "  switch <branch>",
    "  show <hash|ref>",
]

/**
 * One method per CLI command. Recoverable errors are reported here and end
 * the command; fatal ones propagate to the caller.
 */
export class Commands {
    constructor(
        private readonly sp: IStorageProvider,
        private readonly workingDir: string,
        private readonly config: VcsConfig
    ) {
    }

    async run(args: string[]): Promise<void> {
        const [command, ...rest] = args
        if (command === undefined) {
            return this.usage()
        }

        switch (command) {
            case "init":
                return await this.init()
            case "add":
                return rest[0] === undefined ? log.err("Usage: add <file>") : await this.add(rest[0])
            case "commit": {
                const flag = rest.indexOf("-m")
                const message = flag === -1 ? undefined : rest[flag + 1]
                return message === undefined ? log.err("Usage: commit -m \"message\"") : await this.commit(message)
            }
            case "status":
                return await this.status()
            case "log":
                return await this.log()
            case "checkout":
                return rest[0] === undefined ? log.err("Usage: checkout <hash|ref>") : await this.checkout(rest[0])
            case "branch":
                return rest[0] === undefined ? log.err("Usage: branch <name>") : await this.branch(rest[0])
            case "branches":
                return await this.branches()
            case "switch":
                return rest[0] === undefined ? log.err("Usage: switch <branch>") : await this.switchBranch(rest[0])
            case "show":
                return rest[0] === undefined ? log.err("Usage: show <hash|ref>") : await this.show(rest[0])
            default:
                log.err(`Unknown command: ${command}`)
                return this.usage()
        }
    }

    usage() {
        USAGE.forEach(line => log.log(line))
    }

    async init() {
        const {repository, created} = await Repository.init(this.sp, this.workingDir, this.config)
        if (created) {
            log.log(`Initialized empty repository in ${repository.layout.root}`)
        } else {
            log.log(`Repository already exists at ${repository.layout.root}`)
        }
    }

    async add(file: string) {
        await this.withRepository(async repository => {
            const entry = await repository.add(file)
            log.log(`Added to index: ${entry.path} (${entry.digest})`)
        })
    }

    async commit(message: string) {
        await this.withRepository(async repository => {
            const digest = await repository.commit(message)
            log.log(`Created commit: ${digest}`)

            const head = await repository.head()
            if (head.type === "symbolic") {
                log.log(`Updated branch ${head.branch} -> ${digest}`)
            } else {
                log.log(`HEAD is detached; no branch updated.`)
            }
        })
    }

    async status() {
        await this.withRepository(async repository => {
            const {staged, modified} = await repository.status()

            if (staged.length === 0) {
                log.log("No files staged.")
            } else {
                log.log("Staged files:")
                staged.forEach(e => log.log(`  ${e.path} (${e.digest})`))
            }

            if (modified.length > 0) {
                log.log("")
                log.log("Modified but not staged:")
                modified.forEach(p => log.log(`  ${p}`))
            }
        })
    }

    async log() {
        await this.withRepository(async repository => {
            const history = await repository.log()
            if (history.length === 0) {
                log.log("No commits yet.")
                return
            }

            for (const {digest, commit} of history) {
                log.log(`commit ${digest}`)
                log.log(`author ${commit.author} ${commit.timestamp}`)
                log.log("")
                commit.message.split("\n").forEach(line => log.log(`    ${line}`))
                log.log("")
            }
        })
    }

    async checkout(ref: string) {
        await this.withRepository(async repository => {
            const outcome = await repository.checkout(ref)
            if (outcome.type === "branch") {
                this.reportSwitch(outcome.branch, outcome.checkout)
                return
            }

            if (!this.reportRestored(outcome.checkout)) return
            log.log(`HEAD now at ${outcome.checkout.commit} (detached)`)
        })
    }

    async branch(name: string) {
        await this.withRepository(async repository => {
            const start = await repository.createBranch(name)
            log.log(`Created branch ${name} at ${start}`)
        })
    }

    async branches() {
        await this.withRepository(async repository => {
            const branches = await repository.listBranches()
            if (branches.length === 0) {
                log.log("No branches.")
                return
            }
            for (const branch of branches) {
                log.log(`${branch.current ? "*" : " "} ${branch.name} -> ${branch.tip ?? "(no commits)"}`)
            }
        })
    }

    async switchBranch(name: string) {
        await this.withRepository(async repository => {
            const outcome = await repository.switchBranch(name)
            this.reportSwitch(outcome.branch, outcome.checkout)
        })
    }

    async show(ref: string) {
        await this.withRepository(async repository => {
            const {kind, size, payload} = await repository.show(ref)
            log.log(`${kind} ${size}`)
            log.log("----")
            log.log(payload.toString("utf8").replace(/\n$/, ""))
        })
    }

    private reportSwitch(branch: string, checkout: CheckoutResult | undefined) {
        if (!checkout) {
            log.log(`Switched to branch ${branch} (no commits yet)`)
            return
        }
        this.reportRestored(checkout)
        log.log(`Switched to branch ${branch}`)
    }

    /** False when the commit had nothing to restore. */
    private reportRestored(checkout: CheckoutResult): boolean {
        if (checkout.empty) {
            log.log("Nothing to checkout (commit empty).")
            return false
        }
        checkout.restored.forEach(p => log.log(`Restored: ${p}`))
        return true
    }

    private async withRepository(action: (repository: Repository) => Promise<void>) {
        try {
            const repository = await Repository.open(this.sp, this.workingDir, this.config)
            await action(repository)
        } catch (err) {
            if (err instanceof VcsError && !err.fatal) {
                log.err(err.message)
                return
            }
            throw err
        }
    }
}
