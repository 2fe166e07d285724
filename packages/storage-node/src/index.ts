import * as FS from "fs/promises";
import {getLogger} from "@logtape/logtape";
import {PlatformFileSystem} from "@stowage/storage";
import type {StorageConfig} from "./config.js";
import {NodePlatformStorage} from "./node.js";

export {NodePlatformStorage} from "./node.js";
export {
	applyLoggingConfig,
	loadConfig,
	LogLevelSchema,
	parseConfig,
	StorageConfigSchema,
	type Env,
	type StorageConfig,
	type StorageConfigInput,
} from "./config.js";

const logger = getLogger(["stowage", "node"]);

/**
 * Create both application data folders if needed and open a file system
 * whose local and roaming storage are those folders
 */
export async function createNodeFileSystem(
	config: StorageConfig,
): Promise<PlatformFileSystem> {
	await Promise.all([
		FS.mkdir(config.localPath, {recursive: true}),
		FS.mkdir(config.roamingPath, {recursive: true}),
	]);
	logger.info("Opened storage", {
		app: config.appName,
		localPath: config.localPath,
		roamingPath: config.roamingPath,
	});
	return PlatformFileSystem.open(new NodePlatformStorage(), config);
}
