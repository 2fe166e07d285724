import {PlatformFileHandle} from "./file.js";
import {PlatformFolderHandle} from "./folder.js";
import {
	isPlatformNotFound,
	type PlatformFolder,
	type PlatformStorage,
} from "./platform.js";
import type {FileHandle, FileSystem, FolderHandle} from "./types.js";

export interface PlatformFileSystemOptions {
	/** Path of the per-device application data folder */
	localPath: string;
	/** Path of the roaming application data folder */
	roamingPath: string;
}

/**
 * FileSystem over one platform binding
 *
 * The local and roaming folders are the protected roots; every handle this
 * file system hands out carries that set.
 */
export class PlatformFileSystem implements FileSystem {
	readonly localStorage: FolderHandle;
	readonly roamingStorage: FolderHandle;
	#storage: PlatformStorage;
	#protectedRoots: ReadonlySet<string>;

	constructor(
		storage: PlatformStorage,
		localFolder: PlatformFolder,
		roamingFolder: PlatformFolder,
	) {
		this.#storage = storage;
		this.#protectedRoots = new Set([localFolder.path, roamingFolder.path]);
		this.localStorage = this.#wrap(localFolder);
		this.roamingStorage = this.#wrap(roamingFolder);
	}

	/**
	 * Look up both application data folders and build a file system over them
	 *
	 * @throws PlatformError if either folder does not exist
	 */
	static async open(
		storage: PlatformStorage,
		options: PlatformFileSystemOptions,
	): Promise<PlatformFileSystem> {
		const [localFolder, roamingFolder] = await Promise.all([
			storage.getFolderFromPath(options.localPath),
			storage.getFolderFromPath(options.roamingPath),
		]);
		return new PlatformFileSystem(storage, localFolder, roamingFolder);
	}

	async getFolderFromPath(path: string): Promise<FolderHandle | null> {
		try {
			return this.#wrap(await this.#storage.getFolderFromPath(path));
		} catch (error) {
			if (isPlatformNotFound(error)) return null;
			throw error;
		}
	}

	async getFileFromPath(path: string): Promise<FileHandle | null> {
		try {
			return new PlatformFileHandle(await this.#storage.getFileFromPath(path));
		} catch (error) {
			if (isPlatformNotFound(error)) return null;
			throw error;
		}
	}

	#wrap(folder: PlatformFolder): FolderHandle {
		return new PlatformFolderHandle(this.#storage, folder, {
			protectedRoots: this.#protectedRoots,
		});
	}
}
