import { Logger } from 'koishi'

const ROOT_NAME = 'bardkit'

const loggers = new Map<string, Logger>()

let logLevel: number | null = null

/** Returns the shared logger of `scope`, named `bardkit/<scope>`. */
export function createLogger(scope?: string): Logger {
    const name = scope ? `${ROOT_NAME}/${scope}` : ROOT_NAME

    let logger = loggers.get(name)

    if (logger == null) {
        logger = new Logger(name)
        loggers.set(name, logger)
    }

    if (logLevel != null) {
        logger.level = logLevel
    }

    return logger
}

/** Applies to every logger created so far and to the ones created later. */
export function setLoggerLevel(level: number) {
    logLevel = level

    for (const logger of loggers.values()) {
        logger.level = level
    }
}

export function clearLogger() {
    loggers.clear()
    logLevel = null
}
