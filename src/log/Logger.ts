import pino from "pino";

export type Logger = pino.Logger;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: string): value is LogLevel
{
    return LOG_LEVELS.some((level) => level === value);
}

/** Level used when nothing else is configured: quiet under Jest, `info` otherwise. */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel
{
    const fromEnv = env.SIMCORO_LOG_LEVEL;
    if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
    return env.NODE_ENV === "test" ? "silent" : "info";
}

export function createLogger(name: string = "simcoro", level: LogLevel = defaultLogLevel()): Logger
{
    return pino({ name, level });
}

let _logger: Logger | null = null;

export function getLogger(): Logger
{
    if (!_logger) {
        _logger = createLogger();
    }
    return _logger;
}

export function setLogger(logger: Logger): void
{
    _logger = logger;
}
