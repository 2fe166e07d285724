/**
 * Uniform storage contract shared by every platform binding
 */

// ============================================================================
// COLLISION POLICIES
// ============================================================================

/**
 * How a create operation behaves when the desired name is already taken
 */
export const CreationCollisionOption = {
	/** Pick "name (2).ext", "name (3).ext", ... until a free name is found */
	GenerateUniqueName: "generate-unique-name",
	/** Replace the existing entry */
	ReplaceExisting: "replace-existing",
	/** Fail with an already-exists IOError */
	FailIfExists: "fail-if-exists",
	/** Return the existing entry */
	OpenIfExists: "open-if-exists",
} as const;

export type CreationCollisionOption =
	(typeof CreationCollisionOption)[keyof typeof CreationCollisionOption];

/**
 * How a rename behaves when the new name is already taken
 */
export const NameCollisionOption = {
	GenerateUniqueName: "generate-unique-name",
	ReplaceExisting: "replace-existing",
	FailIfExists: "fail-if-exists",
} as const;

export type NameCollisionOption =
	(typeof NameCollisionOption)[keyof typeof NameCollisionOption];

/** Result of Folder.checkExists() */
export type ExistenceCheckResult = "not-found" | "file" | "folder";

// ============================================================================
// HANDLES
// ============================================================================

export interface FileHandle {
	/** Last segment of the path */
	readonly name: string;
	/** Full path, unique within one file system */
	readonly path: string;

	readBytes(): Promise<Uint8Array>;
	writeBytes(data: Uint8Array): Promise<void>;
	readText(): Promise<string>;
	writeText(text: string): Promise<void>;

	/**
	 * Rename the file within its folder. The handle keeps pointing at the old
	 * path; use the returned handle afterwards.
	 */
	rename(newName: string, option?: NameCollisionOption): Promise<FileHandle>;

	delete(): Promise<void>;
}

export interface FolderHandle {
	/** Last segment of the path */
	readonly name: string;
	/** Full path, unique within one file system */
	readonly path: string;
	/** Whether this folder was a protected root when the handle was made */
	readonly isRoot: boolean;

	createFile(
		desiredName: string,
		option: CreationCollisionOption,
	): Promise<FileHandle>;

	/**
	 * Get a file in this folder. Fails if the file does not exist.
	 */
	getFile(name: string): Promise<FileHandle>;

	/**
	 * Snapshot of the files in this folder, in platform order
	 */
	listFiles(): Promise<readonly FileHandle[]>;

	createFolder(
		desiredName: string,
		option: CreationCollisionOption,
	): Promise<FolderHandle>;

	getFolder(name: string): Promise<FolderHandle>;

	/**
	 * Snapshot of the subfolders of this folder, in platform order
	 */
	listFolders(): Promise<readonly FolderHandle[]>;

	checkExists(name: string): Promise<ExistenceCheckResult>;

	/**
	 * Delete this folder and everything in it
	 */
	delete(): Promise<void>;
}

export interface FileSystem {
	/** Per-device application data folder */
	readonly localStorage: FolderHandle;
	/** Application data folder that follows the user between devices */
	readonly roamingStorage: FolderHandle;

	/**
	 * @returns The folder at path, or null if there is no folder there
	 */
	getFolderFromPath(path: string): Promise<FolderHandle | null>;

	/**
	 * @returns The file at path, or null if there is no file there
	 */
	getFileFromPath(path: string): Promise<FileHandle | null>;
}
