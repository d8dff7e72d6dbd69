#!/usr/bin/env node
import {Commands} from "./commands.js"
import {loadConfig} from "./config.js"
import {buildLogger, Logger} from "./logger.js"
import {describeError, FsStorageProvider} from "./storage/index.js"

const log = buildLogger("minivcs")

async function main() {
    const config = loadConfig()
    Logger.conf("dbg", config.debug)

    const commands = new Commands(new FsStorageProvider(), process.cwd(), config)
    await commands.run(process.argv.slice(2))
}

main().catch(err => {
    log.err(describeError(err))
    process.exitCode = 1
})
