import fs from "fs"
import {
    CommitRecord,
    computeDigest,
    Digest,
    NothingStagedError,
    Repository,
} from "../src/index.js"
import {clearTmp, getFileContent, initRepository, makeTmp, pinTime, sp, writeFile} from "./helpers.js"

const shiftTime = function (ms: number) {
    jest.setSystemTime(new Date(Date.now() + ms))
}

const collect = async (history: AsyncIterable<CommitRecord>): Promise<CommitRecord[]> => {
    const records: CommitRecord[] = []
    for await (const record of history) {
        records.push(record)
    }
    return records
}

describe("Commits", () => {
    let tmp: string
    let repository: Repository

    beforeEach(async () => {
        pinTime("2025-01-01T00:00:00.000Z")
        tmp = await makeTmp()
        repository = await initRepository(tmp)
    })

    afterEach(async () => {
        jest.useRealTimers()
        await clearTmp(tmp)
    })

    const commitFile = async (file: string, content: string, message: string): Promise<Digest> => {
        await writeFile(tmp, file, content)
        await repository.add(file)
        const digest = await repository.commit(message)
        shiftTime(5000)
        return digest
    }

    test("Initial", async () => {
        const commit = await commitFile("a.txt", "hello", "first")

        expect(commit).toBe("c04442668f79d202f75bacfcce78a96a2a7b4a04")
        expect(await repository.refs.readBranchTip("main")).toBe(commit)
        expect(await repository.graph.readCommit(commit)).toEqual({
            kind: "commit",
            tree: "3b1d1d73f97f30aab1325ec6fefebe563f71456c",
            author: "JEST",
            timestamp: "2025-01-01T00:00:00.000Z",
            message: "first",
        })
    })

    test("Tree mapping equals the staged mapping and the index is cleared", async () => {
        await writeFile(tmp, "b.txt", "bee")
        await writeFile(tmp, "src/a.ts", "export {}")
        await writeFile(tmp, "c.txt", "sea")
        const staged = [
            await repository.add("b.txt"),
            await repository.add("src/a.ts"),
            await repository.add("c.txt"),
        ]

        const commit = await repository.commit("three files")

        const tree = await repository.graph.resolveTreeMap(commit)
        expect([...tree]).toEqual(staged.map(e => [e.path, e.digest]))
        expect(await repository.index.readAll()).toEqual([])
    })

    test("Identical staged mappings share a tree", async () => {
        const first = await commitFile("a.txt", "same", "one")
        await repository.add("a.txt")
        const second = await repository.commit("two")

        const firstTree = (await repository.graph.readCommit(first)).tree
        const secondCommit = await repository.graph.readCommit(second)
        expect(secondCommit.tree).toBe(firstTree)
        expect(secondCommit.parent).toBe(first)
    })

    test("Nothing staged writes nothing", async () => {
        const before = await sp.readDir(repository.layout.objectsDir)

        await expect(repository.commit("empty")).rejects.toThrow(NothingStagedError)

        expect(await sp.readDir(repository.layout.objectsDir)).toEqual(before)
        expect(await getFileContent(repository.layout.branchPath("main"))).toBe("")
    })

    test("Multi-line messages and author names with spaces survive", async () => {
        await writeFile(tmp, "a.txt", "x")
        await repository.add("a.txt")
        const commit = await repository.commit("subject\n\nbody line", "Grace Hopper")

        const parsed = await repository.graph.readCommit(commit)
        expect(parsed.author).toBe("Grace Hopper")
        expect(parsed.message).toBe("subject\n\nbody line")
    })

    test("Line breaks in the author are flattened", async () => {
        await writeFile(tmp, "a.txt", "x")
        await repository.add("a.txt")
        const commit = await repository.commit("msg", "Grace\nHopper")

        expect((await repository.graph.readCommit(commit)).author).toBe("Grace Hopper")
    })

    test("Commit on a detached HEAD advances no ref", async () => {
        const first = await commitFile("a.txt", "1", "one")
        const second = await commitFile("a.txt", "2", "two")
        await repository.checkout(first)

        const detached = await commitFile("a.txt", "3", "three")

        expect(await repository.refs.readBranchTip("main")).toBe(second)
        expect(await repository.head()).toEqual({type: "detached", digest: first})
        expect((await repository.graph.readCommit(detached)).parent).toBe(first)
        expect(await repository.objects.has(detached)).toBe(true)
    })

    test("Walk ancestry from child to root", async () => {
        const one = await commitFile("a.txt", "1", "one")
        const two = await commitFile("a.txt", "2", "two")
        const three = await commitFile("b.txt", "3", "three")

        const history = await collect(repository.graph.walkAncestry(three))
        expect(history.map(r => r.digest)).toEqual([three, two, one])
        expect(history.map(r => r.commit.message)).toEqual(["three", "two", "one"])
        expect(history[2].commit.parent).toBeUndefined()

        // Walks are repeatable
        expect((await collect(repository.graph.walkAncestry(three))).map(r => r.digest)).toEqual([three, two, one])
        expect((await collect(repository.graph.walkAncestry(two))).map(r => r.digest)).toEqual([two, one])
    })

    test("Walk stops at an unreadable parent", async () => {
        const one = await commitFile("a.txt", "1", "one")
        const two = await commitFile("a.txt", "2", "two")
        await fs.promises.rm(repository.layout.objectPath(one))

        const history = await collect(repository.graph.walkAncestry(two))
        expect(history.map(r => r.digest)).toEqual([two])
        expect(await collect(repository.graph.walkAncestry(undefined))).toEqual([])
    })

    test("Log follows the current commit", async () => {
        expect(await repository.log()).toEqual([])

        const one = await commitFile("a.txt", "1", "one")
        const two = await commitFile("a.txt", "2", "two")

        expect((await repository.log()).map(r => r.digest)).toEqual([two, one])
    })

    test("Tree map of missing or non-commit objects is empty", async () => {
        const blob = computeDigest("blob", Buffer.from("hello"))
        await commitFile("a.txt", "hello", "first")

        expect(await repository.graph.resolveTreeMap(undefined)).toEqual(new Map())
        expect(await repository.graph.resolveTreeMap(blob)).toEqual(new Map())
        const missing = computeDigest("blob", Buffer.from("never stored"))
        expect(await repository.graph.resolveTreeMap(missing)).toEqual(new Map())
    })
})
