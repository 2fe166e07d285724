import {configure, getConsoleSink, type LogLevel} from "@logtape/logtape";

const STOWAGE_CATEGORIES = ["folder", "file", "memory", "node"] as const;

export type StowageCategory = (typeof STOWAGE_CATEGORIES)[number];

export interface LoggingConfig {
	/** Default level for every stowage category */
	level?: LogLevel;
	/** Per-category overrides */
	categories?: Partial<Record<StowageCategory, LogLevel>>;
}

/**
 * Configure LogTape for the stowage categories. Libraries only ever call
 * getLogger(); applications call this once at startup.
 *
 * @param options.reset - Whether to reset existing LogTape config (default: true)
 */
export async function configureLogging(
	config: LoggingConfig = {},
	options: {reset?: boolean} = {},
): Promise<void> {
	const level = config.level ?? "info";
	const reset = options.reset !== false;

	const loggers = STOWAGE_CATEGORIES.map((category) => ({
		category: ["stowage", category],
		lowestLevel: config.categories?.[category] ?? level,
		sinks: ["console" as const],
	}));

	await configure({
		reset,
		sinks: {
			console: getConsoleSink(),
		},
		loggers: [
			...loggers,
			// Suppress info messages about LogTape itself
			{category: ["logtape", "meta"], lowestLevel: "warning", sinks: []},
		],
	});
}
