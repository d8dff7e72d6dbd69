import fs from "fs"
import os from "node:os"
import path from "node:path"
import {FsStorageProvider, LogLevel, LogSink, Repository, VcsConfig} from "../src/index.js"

export const sp = new FsStorageProvider()

export const testConfig: VcsConfig = {
    vcsDir: ".minivcs",
    author: "JEST",
    defaultBranch: "main",
    debug: false,
}

export const makeTmp = async (): Promise<string> =>
    await fs.promises.mkdtemp(path.join(os.tmpdir(), "minivcs-test-"))

export const clearTmp = async (dir: string) => {
    await sp.deleteFileOrDir(dir)
}

export const writeFile = async (dir: string, filePath: string, content: string) => {
    await sp.createFile(path.join(dir, filePath), Buffer.from(content))
}

export const getFileContent = async (filePath: string): Promise<string> => {
    const file = await sp.readFile(filePath)
    return (await file.readData()).toString()
}

export const initRepository = async (dir: string): Promise<Repository> => {
    const {repository} = await Repository.init(sp, dir, testConfig)
    return repository
}

// Fakes Date only; fs and glob keep real timers and ticks
export const pinTime = (iso: string) => {
    jest
        .useFakeTimers({
            doNotFake: [
                "hrtime",
                "nextTick",
                "performance",
                "queueMicrotask",
                "setImmediate",
                "clearImmediate",
                "setInterval",
                "clearInterval",
                "setTimeout",
                "clearTimeout",
            ],
        })
        .setSystemTime(new Date(iso))
}

export class MemorySink implements LogSink {
    entries: { level: LogLevel, line: string }[] = []

    write(level: LogLevel, line: string) {
        this.entries.push({level, line})
    }

    lines(level: LogLevel = "log"): string[] {
        return this.entries.filter(e => e.level === level).map(e => e.line)
    }

    clear() {
        this.entries = []
    }
}
