import {getLogger} from "@logtape/logtape";
import {IOError} from "./errors.js";
import {PlatformFileHandle} from "./file.js";
import {
	isPlatformNotFound,
	type PlatformFile,
	type PlatformFolder,
	type PlatformStorage,
} from "./platform.js";
import {
	assertValidName,
	toPlatformCreationOption,
	translateAlreadyExists,
	translateFolderNotFound,
} from "./translate.js";
import type {
	CreationCollisionOption,
	ExistenceCheckResult,
	FileHandle,
	FolderHandle,
} from "./types.js";

const logger = getLogger(["stowage", "folder"]);

/** Whether path is ancestor, or the same path, of other */
function contains(path: string, other: string): boolean {
	if (other === path) return true;
	const base = path.replace(/[\\/]+$/, "");
	return other.startsWith(base + "/") || other.startsWith(base + "\\");
}

function refuseRootDeletion(path: string): IOError {
	logger.warn("Refusing to delete root folder", {path});
	return new IOError("Cannot delete root storage folder.", {
		reason: "root-deletion-forbidden",
	});
}

export interface PlatformFolderHandleOptions {
	/**
	 * Paths that can never be deleted through a handle. A handle is a root
	 * if its path is in this set when it is constructed.
	 */
	protectedRoots?: Iterable<string>;
}

/**
 * Folder handle over a platform folder reference
 *
 * Every operation looks the folder up again by path before delegating, so a
 * handle whose folder was removed behind its back fails with
 * DirectoryNotFoundError instead of whatever the platform call would report.
 */
export class PlatformFolderHandle implements FolderHandle {
	readonly isRoot: boolean;
	#storage: PlatformStorage;
	#folder: PlatformFolder;
	#protectedRoots: ReadonlySet<string>;

	constructor(
		storage: PlatformStorage,
		folder: PlatformFolder,
		options: PlatformFolderHandleOptions = {},
	) {
		this.#storage = storage;
		this.#folder = folder;
		this.#protectedRoots = new Set(options.protectedRoots);
		this.isRoot = this.#protectedRoots.has(folder.path);
	}

	get name(): string {
		return this.#folder.name;
	}

	get path(): string {
		return this.#folder.path;
	}

	async createFile(
		desiredName: string,
		option: CreationCollisionOption,
	): Promise<FileHandle> {
		const platformOption = toPlatformCreationOption(option);
		assertValidName(desiredName);
		await this.#ensureExists();

		logger.debug("Creating file", {folder: this.path, desiredName, option});
		let file: PlatformFile;
		try {
			file = await this.#folder.createFile(desiredName, platformOption);
		} catch (error) {
			throw translateAlreadyExists(error);
		}
		return new PlatformFileHandle(file);
	}

	async getFile(name: string): Promise<FileHandle> {
		assertValidName(name);
		await this.#ensureExists();
		// A missing file surfaces as the platform's own error
		const file = await this.#folder.getFile(name);
		return new PlatformFileHandle(file);
	}

	async listFiles(): Promise<readonly FileHandle[]> {
		await this.#ensureExists();
		const files = await this.#folder.getFiles();
		return Object.freeze(files.map((file) => new PlatformFileHandle(file)));
	}

	async createFolder(
		desiredName: string,
		option: CreationCollisionOption,
	): Promise<FolderHandle> {
		const platformOption = toPlatformCreationOption(option);
		assertValidName(desiredName);
		await this.#ensureExists();
		if (platformOption === "replaceExisting") {
			// Replacing empties the existing folder first
			await this.#assertNoRootWithin(desiredName);
		}

		logger.debug("Creating folder", {folder: this.path, desiredName, option});
		let folder: PlatformFolder;
		try {
			folder = await this.#folder.createFolder(desiredName, platformOption);
		} catch (error) {
			throw translateAlreadyExists(error);
		}
		return this.#wrap(folder);
	}

	async getFolder(name: string): Promise<FolderHandle> {
		assertValidName(name);
		await this.#ensureExists();

		let folder: PlatformFolder;
		try {
			folder = await this.#folder.getFolder(name);
		} catch (error) {
			throw translateFolderNotFound(error);
		}
		return this.#wrap(folder);
	}

	async listFolders(): Promise<readonly FolderHandle[]> {
		await this.#ensureExists();
		const folders = await this.#folder.getFolders();
		return Object.freeze(folders.map((folder) => this.#wrap(folder)));
	}

	async checkExists(name: string): Promise<ExistenceCheckResult> {
		assertValidName(name);
		await this.#ensureExists();

		const stat = await this.#folder.stat(name);
		if (!stat) return "not-found";
		return stat.kind === "file" ? "file" : "folder";
	}

	async delete(): Promise<void> {
		if (this.isRoot || this.#holdsRoot(this.path)) {
			throw refuseRootDeletion(this.path);
		}

		await this.#ensureExists();
		logger.debug("Deleting folder", {path: this.path});
		await this.#folder.delete();
	}

	#wrap(folder: PlatformFolder): PlatformFolderHandle {
		return new PlatformFolderHandle(this.#storage, folder, {
			protectedRoots: this.#protectedRoots,
		});
	}

	#holdsRoot(path: string): boolean {
		for (const root of this.#protectedRoots) {
			if (contains(path, root)) return true;
		}
		return false;
	}

	async #assertNoRootWithin(name: string): Promise<void> {
		let child: PlatformFolder;
		try {
			child = await this.#folder.getFolder(name);
		} catch (error) {
			if (isPlatformNotFound(error)) return;
			throw error;
		}
		if (this.#holdsRoot(child.path)) {
			throw refuseRootDeletion(child.path);
		}
	}

	async #ensureExists(): Promise<void> {
		try {
			await this.#storage.getFolderFromPath(this.path);
		} catch (error) {
			throw translateFolderNotFound(error);
		}
	}
}
