/**
 * Node.js platform binding
 *
 * Provides NodePlatformStorage, a PlatformStorage over the Node.js fs module.
 * Errno codes are reported as PlatformError statuses.
 */

import * as FS from "fs/promises";
import * as Path from "path";
import {getLogger} from "@logtape/logtape";
import {
	isValidName,
	PlatformError,
	PlatformStatus,
	uniqueNameCandidates,
	type PlatformCreationOption,
	type PlatformFile,
	type PlatformFolder,
	type PlatformNameOption,
	type PlatformStorage,
} from "@stowage/storage";

const logger = getLogger(["stowage", "node"]);

/** Type guard for Node.js errors with error codes */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

const STATUS_BY_CODE = new Map<string, number>([
	["ENOENT", PlatformStatus.FileNotFound],
	["ENOTDIR", PlatformStatus.PathNotFound],
	["EACCES", PlatformStatus.AccessDenied],
	["EPERM", PlatformStatus.AccessDenied],
	["EEXIST", PlatformStatus.AlreadyExists],
]);

function toPlatformError(error: unknown): unknown {
	if (isErrnoException(error) && error.code) {
		const status = STATUS_BY_CODE.get(error.code);
		if (status !== undefined) {
			return new PlatformError(status, error.message, {cause: error});
		}
	}
	return error;
}

function isErrno(error: unknown, code: string): boolean {
	return isErrnoException(error) && error.code === code;
}

/**
 * Run an fs call, reporting known errno failures as PlatformError
 */
async function platformCall<T>(call: () => Promise<T>): Promise<T> {
	try {
		return await call();
	} catch (error) {
		throw toPlatformError(error);
	}
}

function notFound(path: string): PlatformError {
	return new PlatformError(
		PlatformStatus.FileNotFound,
		`The system cannot find the file specified: ${path}`,
	);
}

function alreadyExists(path: string): PlatformError {
	return new PlatformError(
		PlatformStatus.AlreadyExists,
		`Cannot create a file when that file already exists: ${path}`,
	);
}

function checkName(name: string): void {
	if (!isValidName(name)) {
		throw new PlatformError(
			PlatformStatus.InvalidName,
			`The filename, directory name, or volume label syntax is incorrect: ${name}`,
		);
	}
}

async function statKind(
	path: string,
): Promise<"file" | "directory" | "other" | null> {
	try {
		const stats = await FS.stat(path);
		if (stats.isFile()) return "file";
		if (stats.isDirectory()) return "directory";
		return "other";
	} catch (error) {
		if (isErrno(error, "ENOENT") || isErrno(error, "ENOTDIR")) {
			return null;
		}
		throw error;
	}
}

/** Create an empty file, failing with EEXIST if anything is at path */
async function createExclusive(path: string): Promise<void> {
	const handle = await FS.open(path, "wx");
	await handle.close();
}

class NodePlatformFile implements PlatformFile {
	readonly name: string;
	readonly path: string;

	constructor(path: string) {
		this.path = path;
		this.name = Path.basename(path);
	}

	async readBytes(): Promise<Uint8Array> {
		const buffer = await platformCall(() => FS.readFile(this.path));
		return new Uint8Array(buffer);
	}

	async writeBytes(data: Uint8Array): Promise<void> {
		// r+ so a file deleted in the meantime is not silently recreated
		await platformCall(async () => {
			const handle = await FS.open(this.path, "r+");
			try {
				await handle.truncate(0);
				await handle.writeFile(data);
			} finally {
				await handle.close();
			}
		});
	}

	async rename(
		desiredName: string,
		option: PlatformNameOption,
	): Promise<PlatformFile> {
		checkName(desiredName);
		if (desiredName === this.name) return this;

		const parent = Path.dirname(this.path);
		const target = await platformCall(async () => {
			switch (option) {
				case "replaceExisting": {
					const destination = Path.join(parent, desiredName);
					if ((await statKind(destination)) === "directory") {
						throw alreadyExists(destination);
					}
					await FS.rename(this.path, destination);
					return destination;
				}
				case "failIfExists": {
					const destination = Path.join(parent, desiredName);
					await this.#linkThenUnlink(destination);
					return destination;
				}
				case "generateUniqueName":
					for (const candidate of uniqueNameCandidates(desiredName)) {
						const destination = Path.join(parent, candidate);
						try {
							await this.#linkThenUnlink(destination);
							return destination;
						} catch (error) {
							if (!isErrno(error, "EEXIST")) throw error;
						}
					}
					throw alreadyExists(Path.join(parent, desiredName));
			}
		});

		logger.debug("Renamed file", {path: this.path, target});
		return new NodePlatformFile(target);
	}

	async delete(): Promise<void> {
		await platformCall(() => FS.unlink(this.path));
	}

	/** Rename that fails with EEXIST instead of replacing */
	async #linkThenUnlink(destination: string): Promise<void> {
		await FS.link(this.path, destination);
		try {
			await FS.unlink(this.path);
		} catch (error) {
			await FS.unlink(destination);
			throw error;
		}
	}
}

class NodePlatformFolder implements PlatformFolder {
	readonly name: string;
	readonly path: string;

	constructor(path: string) {
		this.path = path;
		this.name = Path.basename(path) || path;
	}

	async createFile(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFile> {
		checkName(desiredName);
		const path = await platformCall(async () => {
			const desiredPath = Path.join(this.path, desiredName);
			switch (option) {
				case "failIfExists":
					await createExclusive(desiredPath);
					return desiredPath;
				case "replaceExisting":
				case "openIfExists": {
					// Opening a FIFO would block until a reader shows up
					const kind = await statKind(desiredPath);
					if (kind === "directory" || kind === "other") {
						throw alreadyExists(desiredPath);
					}
					// "a" creates without truncating, "w" truncates
					const handle = await FS.open(
						desiredPath,
						option === "openIfExists" ? "a" : "w",
					);
					await handle.close();
					return desiredPath;
				}
				case "generateUniqueName":
					for (const candidate of uniqueNameCandidates(desiredName)) {
						const candidatePath = Path.join(this.path, candidate);
						try {
							await createExclusive(candidatePath);
							return candidatePath;
						} catch (error) {
							if (!isErrno(error, "EEXIST")) throw error;
						}
					}
					throw alreadyExists(desiredPath);
			}
		});
		return new NodePlatformFile(path);
	}

	async getFile(name: string): Promise<PlatformFile> {
		checkName(name);
		const path = Path.join(this.path, name);
		if ((await platformCall(() => statKind(path))) !== "file") {
			throw notFound(path);
		}
		return new NodePlatformFile(path);
	}

	async getFiles(): Promise<PlatformFile[]> {
		const entries = await platformCall(() =>
			FS.readdir(this.path, {withFileTypes: true}),
		);
		return entries
			.filter((entry) => entry.isFile())
			.map((entry) => new NodePlatformFile(Path.join(this.path, entry.name)));
	}

	async createFolder(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFolder> {
		checkName(desiredName);
		const path = await platformCall(async () => {
			const desiredPath = Path.join(this.path, desiredName);
			switch (option) {
				case "failIfExists":
					await FS.mkdir(desiredPath);
					return desiredPath;
				case "openIfExists":
					try {
						await FS.mkdir(desiredPath);
					} catch (error) {
						if (
							!isErrno(error, "EEXIST") ||
							(await statKind(desiredPath)) !== "directory"
						) {
							throw error;
						}
					}
					return desiredPath;
				case "replaceExisting": {
					const kind = await statKind(desiredPath);
					if (kind === "directory") {
						await FS.rm(desiredPath, {recursive: true});
					} else if (kind !== null) {
						throw alreadyExists(desiredPath);
					}
					await FS.mkdir(desiredPath);
					return desiredPath;
				}
				case "generateUniqueName":
					for (const candidate of uniqueNameCandidates(desiredName)) {
						const candidatePath = Path.join(this.path, candidate);
						try {
							await FS.mkdir(candidatePath);
							return candidatePath;
						} catch (error) {
							if (!isErrno(error, "EEXIST")) throw error;
						}
					}
					throw alreadyExists(desiredPath);
			}
		});
		return new NodePlatformFolder(path);
	}

	async getFolder(name: string): Promise<PlatformFolder> {
		checkName(name);
		const path = Path.join(this.path, name);
		if ((await platformCall(() => statKind(path))) !== "directory") {
			throw notFound(path);
		}
		return new NodePlatformFolder(path);
	}

	async getFolders(): Promise<PlatformFolder[]> {
		const entries = await platformCall(() =>
			FS.readdir(this.path, {withFileTypes: true}),
		);
		return entries
			.filter((entry) => entry.isDirectory())
			.map((entry) => new NodePlatformFolder(Path.join(this.path, entry.name)));
	}

	async stat(name: string): Promise<{kind: "file" | "directory"} | null> {
		checkName(name);
		const kind = await platformCall(() => statKind(Path.join(this.path, name)));
		if (kind === "file" || kind === "directory") return {kind};
		return null;
	}

	async delete(): Promise<void> {
		await platformCall(() => FS.rm(this.path, {recursive: true}));
		logger.debug("Deleted folder", {path: this.path});
	}
}

/**
 * Storage subsystem over the local disk. Paths are resolved against the
 * current working directory.
 */
export class NodePlatformStorage implements PlatformStorage {
	async getFolderFromPath(path: string): Promise<PlatformFolder> {
		const resolved = Path.resolve(path);
		if ((await platformCall(() => statKind(resolved))) !== "directory") {
			throw notFound(resolved);
		}
		return new NodePlatformFolder(resolved);
	}

	async getFileFromPath(path: string): Promise<PlatformFile> {
		const resolved = Path.resolve(path);
		if ((await platformCall(() => statKind(resolved))) !== "file") {
			throw notFound(resolved);
		}
		return new NodePlatformFile(resolved);
	}
}
