import * as colors from "colors/safe"

export type LogLevel = "log" | "dbg" | "err"

export interface LogSink {
    write(level: LogLevel, line: string): void
}

export const consoleSink: LogSink = {
    write(level: LogLevel, line: string) {
        switch (level) {
            case "err":
                console.error(colors.red(line))
                break
            case "dbg":
                console.log(colors.yellow(line))
                break
            default:
                console.log(line)
        }
    }
}

export class Logger {
    private static config: Record<LogLevel, boolean> = {
        log: true,
        dbg: false,
        err: true
    }

    private static sink: LogSink = consoleSink

    static conf(level: LogLevel, show: boolean) {
        Logger.config[level] = show
    }

    static setSink(sink: LogSink) {
        Logger.sink = sink
    }

    private readonly id: string

    constructor(id: string) {
        this.id = id
    }

    log(message: string) {
        this.output("log", message)
    }

    dbg(message: string) {
        // Debug lines carry the component id, user-facing lines do not
        this.output("dbg", `[${this.id}] ${message}`)
    }

    err(message: string) {
        this.output("err", message)
    }

    private output(level: LogLevel, message: string) {
        if (!Logger.config[level]) return
        Logger.sink.write(level, message)
    }
}

export function buildLogger(id: string): Logger {
    return new Logger(id)
}
