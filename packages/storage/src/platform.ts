/**
 * Platform storage subsystem contract
 *
 * A platform binding exposes the host's native storage API in this shape.
 * The handles in ./folder.ts and ./file.ts adapt it to the uniform contract.
 */

// ============================================================================
// STATUS CODES
// ============================================================================

/**
 * Numeric statuses a platform reports on failure, as signed 32-bit
 * HRESULT values
 */
export const PlatformStatus = {
	FileNotFound: 0x80070002 | 0,
	PathNotFound: 0x80070003 | 0,
	AccessDenied: 0x80070005 | 0,
	InvalidName: 0x8007007b | 0,
	AlreadyExists: 0x800700b7 | 0,
} as const;

export interface PlatformErrorOptions {
	cause?: unknown;
}

/**
 * Error raised by a platform binding. Only the status is meaningful to the
 * adapters; message and cause are kept for diagnostics.
 */
export class PlatformError extends Error {
	readonly status: number;

	constructor(status: number, message: string, options: PlatformErrorOptions = {}) {
		super(message, {cause: options.cause});
		this.name = "PlatformError";
		this.status = status;
	}
}

export function isPlatformNotFound(error: unknown): error is PlatformError {
	return (
		error instanceof PlatformError &&
		(error.status === PlatformStatus.FileNotFound ||
			error.status === PlatformStatus.PathNotFound)
	);
}

export function isPlatformAlreadyExists(error: unknown): error is PlatformError {
	return (
		error instanceof PlatformError &&
		error.status === PlatformStatus.AlreadyExists
	);
}

// ============================================================================
// BINDING INTERFACES
// ============================================================================

/** Native collision policy for creating files and folders */
export type PlatformCreationOption =
	| "generateUniqueName"
	| "replaceExisting"
	| "failIfExists"
	| "openIfExists";

/** Native collision policy for renames */
export type PlatformNameOption =
	| "generateUniqueName"
	| "replaceExisting"
	| "failIfExists";

export interface PlatformFile {
	readonly name: string;
	readonly path: string;
	readBytes(): Promise<Uint8Array>;
	writeBytes(data: Uint8Array): Promise<void>;
	rename(desiredName: string, option: PlatformNameOption): Promise<PlatformFile>;
	delete(): Promise<void>;
}

export interface PlatformFolder {
	readonly name: string;
	readonly path: string;
	createFile(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFile>;
	getFile(name: string): Promise<PlatformFile>;
	getFiles(): Promise<PlatformFile[]>;
	createFolder(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFolder>;
	getFolder(name: string): Promise<PlatformFolder>;
	getFolders(): Promise<PlatformFolder[]>;
	/**
	 * Check whether a direct child exists and return its type
	 * @returns Entry info if exists, null if not found
	 */
	stat(name: string): Promise<{kind: "file" | "directory"} | null>;
	/** Delete the folder and all of its contents */
	delete(): Promise<void>;
}

export interface PlatformStorage {
	/**
	 * @throws PlatformError with a not-found status if no folder is at path
	 */
	getFolderFromPath(path: string): Promise<PlatformFolder>;
	/**
	 * @throws PlatformError with a not-found status if no file is at path
	 */
	getFileFromPath(path: string): Promise<PlatformFile>;
}

// ============================================================================
// NAME HELPERS
// ============================================================================

/**
 * Check that a name is a single path segment. Bindings call this before
 * touching storage so a name can never reach outside its parent folder.
 */
export function isValidName(name: string): boolean {
	if (!name || name.trim() === "") return false;
	if (name.includes("/") || name.includes("\\") || name.includes("\0")) {
		return false;
	}
	return name !== "." && name !== "..";
}

/**
 * Candidate names for generate-unique-name, in the order a platform tries
 * them: "report.txt", "report (2).txt", "report (3).txt", ...
 */
export function* uniqueNameCandidates(desiredName: string): Generator<string> {
	yield desiredName;
	const dot = desiredName.lastIndexOf(".");
	const stem = dot > 0 ? desiredName.slice(0, dot) : desiredName;
	const ext = dot > 0 ? desiredName.slice(dot) : "";
	for (let n = 2; ; n++) {
		yield `${stem} (${n})${ext}`;
	}
}
