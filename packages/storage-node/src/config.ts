/**
 * Storage configuration
 *
 * Environment variables:
 *   STOWAGE_APP_NAME     - application folder name (required)
 *   STOWAGE_LOCAL_PATH   - local storage folder (default: $XDG_DATA_HOME/<app>)
 *   STOWAGE_ROAMING_PATH - roaming storage folder (default: $XDG_CONFIG_HOME/<app>)
 *   STOWAGE_LOG_LEVEL    - trace, debug, info, warning, error or fatal
 */

import * as OS from "os";
import * as Path from "path";
import type {LogLevel} from "@logtape/logtape";
import {
	configureLogging,
	InvalidArgumentError,
	isValidName,
} from "@stowage/storage";
import {z} from "zod";

export const LogLevelSchema = z.enum([
	"trace",
	"debug",
	"info",
	"warning",
	"error",
	"fatal",
]);

export const StorageConfigSchema = z.object({
	appName: z.string().refine(isValidName, {
		message: "appName must be a single path segment",
	}),
	localPath: z.string().min(1).optional(),
	roamingPath: z.string().min(1).optional(),
	logging: z
		.object({
			level: LogLevelSchema.default("info"),
		})
		.default({}),
});

export type StorageConfigInput = z.input<typeof StorageConfigSchema>;

export interface StorageConfig {
	appName: string;
	/** Absolute path of the local storage root */
	localPath: string;
	/** Absolute path of the roaming storage root */
	roamingPath: string;
	logging: {level: LogLevel};
}

export type Env = Record<string, string | undefined>;

/**
 * Validate a config object and fill in default paths
 *
 * @throws InvalidArgumentError if the config does not match the schema
 */
export function parseConfig(
	input: unknown,
	env: Env = process.env,
): StorageConfig {
	const result = StorageConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
			.join("; ");
		throw new InvalidArgumentError(`Invalid storage config: ${issues}`, {
			cause: result.error,
		});
	}

	const {appName, localPath, roamingPath, logging} = result.data;
	const home = OS.homedir();
	const dataHome = env.XDG_DATA_HOME || Path.join(home, ".local", "share");
	const configHome = env.XDG_CONFIG_HOME || Path.join(home, ".config");

	return {
		appName,
		localPath: Path.resolve(localPath ?? Path.join(dataHome, appName)),
		roamingPath: Path.resolve(roamingPath ?? Path.join(configHome, appName)),
		logging: {level: logging.level},
	};
}

/**
 * Read the config from environment variables. Empty values count as unset.
 */
export function loadConfig(env: Env = process.env): StorageConfig {
	return parseConfig(
		{
			appName: env.STOWAGE_APP_NAME,
			localPath: env.STOWAGE_LOCAL_PATH || undefined,
			roamingPath: env.STOWAGE_ROAMING_PATH || undefined,
			logging: {level: env.STOWAGE_LOG_LEVEL || undefined},
		},
		env,
	);
}

/**
 * Route the stowage log categories to the console at the configured level.
 * Meant for applications at startup; nothing in the storage packages
 * installs sinks on its own.
 */
export async function applyLoggingConfig(
	config: Pick<StorageConfig, "logging">,
): Promise<void> {
	await configureLogging({level: config.logging.level});
}
