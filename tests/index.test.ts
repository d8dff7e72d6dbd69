import fs from "fs"
import path from "node:path"
import {computeDigest, FileNotFoundError, InvalidPathError, parseIndex, Repository} from "../src/index.js"
import {clearTmp, getFileContent, initRepository, makeTmp, writeFile} from "./helpers.js"

const blobDigest = (content: string) => computeDigest("blob", Buffer.from(content))

describe("Staging index", () => {
    let tmp: string
    let repository: Repository

    beforeEach(async () => {
        tmp = await makeTmp()
        repository = await initRepository(tmp)
    })

    afterEach(async () => {
        await clearTmp(tmp)
    })

    test("Stage writes the blob and the index line", async () => {
        const digest = await repository.index.stage("a.txt", Buffer.from("hello"))

        expect(digest).toBe(blobDigest("hello"))
        expect(await repository.objects.has(digest)).toBe(true)
        expect(await getFileContent(repository.layout.indexFile)).toBe(`a.txt\t${digest}\n`)
        expect(await repository.index.readAll()).toEqual([{path: "a.txt", digest}])
    })

    test("Restaging a path replaces its entry in place", async () => {
        await repository.index.stage("a.txt", Buffer.from("1"))
        await repository.index.stage("b.txt", Buffer.from("2"))
        await repository.index.stage("c.txt", Buffer.from("3"))
        await repository.index.stage("a.txt", Buffer.from("changed"))

        expect(await repository.index.readAll()).toEqual([
            {path: "a.txt", digest: blobDigest("changed")},
            {path: "b.txt", digest: blobDigest("2")},
            {path: "c.txt", digest: blobDigest("3")},
        ])
    })

    test("Missing index file reads as empty", async () => {
        await fs.promises.rm(repository.layout.indexFile)
        expect(await repository.index.readAll()).toEqual([])
    })

    test("Clear", async () => {
        await repository.index.stage("a.txt", Buffer.from("hello"))
        await repository.index.clear()

        expect(await repository.index.readAll()).toEqual([])
        expect(await getFileContent(repository.layout.indexFile)).toBe("")
    })

    test("Stage rejects paths the index cannot hold", async () => {
        await expect(repository.index.stage("a\tb.txt", Buffer.from("tab"))).rejects.toThrow("tabs and line breaks are not supported")
        await expect(repository.index.stage("a\nb.txt", Buffer.from("newline"))).rejects.toThrow(InvalidPathError)
        await expect(repository.index.stage(path.join("..", "out.txt"), Buffer.from("out"))).rejects.toThrow("outside the repository")

        expect(await repository.index.readAll()).toEqual([])
        expect(await repository.objects.has(blobDigest("tab"))).toBe(false)
    })

    test("Stage stores the repository-relative path", async () => {
        const digest = await repository.index.stage(path.join(tmp, "docs", "a.txt"), Buffer.from("doc"))

        expect(await repository.index.readAll()).toEqual([{path: "docs/a.txt", digest}])
    })

    test("Malformed lines are skipped", () => {
        const digest = blobDigest("x")
        expect(parseIndex(`a.txt\t${digest}\n\nbroken line\nb.txt\tnot-a-digest\n\t${digest}\nc.txt\t${digest}\n`)).toEqual([
            {path: "a.txt", digest},
            {path: "c.txt", digest},
        ])
    })
})

describe("Add", () => {
    let tmp: string
    let repository: Repository

    beforeEach(async () => {
        tmp = await makeTmp()
        repository = await initRepository(tmp)
    })

    afterEach(async () => {
        await clearTmp(tmp)
    })

    test("Paths are stored relative to the working directory", async () => {
        await writeFile(tmp, path.join("docs", "guide.md"), "# Guide")

        const entry = await repository.add(path.join(tmp, "docs", "guide.md"))

        expect(entry).toEqual({path: "docs/guide.md", digest: blobDigest("# Guide")})
        expect(await repository.index.readAll()).toEqual([entry])
    })

    test("Relative paths resolve against the working directory", async () => {
        await writeFile(tmp, "a.txt", "hello")

        const entry = await repository.add("a.txt")

        expect(entry.path).toBe("a.txt")
    })

    test("Missing file leaves the index unchanged", async () => {
        await writeFile(tmp, "a.txt", "hello")
        await repository.add("a.txt")

        await expect(repository.add("missing.txt")).rejects.toThrow(FileNotFoundError)
        await expect(repository.add("missing.txt")).rejects.toThrow("File not found: missing.txt")
        expect(await repository.index.readAll()).toEqual([{path: "a.txt", digest: blobDigest("hello")}])
    })

    test("Directories are not files", async () => {
        await writeFile(tmp, path.join("dir", "x.txt"), "x")
        await expect(repository.add("dir")).rejects.toThrow(FileNotFoundError)
    })

    test("Paths outside the working directory are rejected", async () => {
        await expect(repository.add(path.join("..", "elsewhere.txt"))).rejects.toThrow(InvalidPathError)
        await expect(repository.add(path.join(".minivcs", "HEAD"))).rejects.toThrow("inside the repository directory")
        expect(await repository.index.readAll()).toEqual([])
    })
})
