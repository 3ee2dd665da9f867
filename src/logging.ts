import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * CONDTREE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const level = env.CONDTREE_LOG_LEVEL?.toLowerCase();
	if (level !== undefined && isLogLevel(level)) return level;
	return "silent";
}

let rootLogger: Logger | null = null;

/** Root logger, created on first use. Writes JSON to stderr so test-runner stdout stays clean. */
export function getRootLogger(): Logger {
	if (rootLogger === null) {
		rootLogger = pino(
			{
				name: "condtree",
				level: getLogLevel(),
				timestamp: pino.stdTimeFunctions.isoTime,
				serializers: { err: pino.stdSerializers.err },
			},
			pino.destination({ dest: 2, sync: true }),
		);
	}
	return rootLogger;
}

/** Child logger tagged with the emitting component. */
export function createLogger(component: string): Logger {
	return getRootLogger().child({ component });
}
