/**
 * Storage error classes with native cause support and serialization
 */

const STORAGE_ERROR = Symbol.for("stowage.storage-error");

/** Options for creating storage errors */
export interface StorageErrorOptions {
	/** Original error that caused this storage error */
	cause?: unknown;
}

/** Base storage error class */
export class StorageError extends Error {
	constructor(message: string, options: StorageErrorOptions = {}) {
		super(message, {cause: options.cause});
		this.name = this.constructor.name;
	}

	/**
	 * Convert error to a plain object for serialization
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
		};
	}
}

Object.defineProperty(StorageError.prototype, STORAGE_ERROR, {value: true});

/**
 * Check if a value is a storage error, including errors thrown by another
 * copy of this package
 */
export function isStorageError(value: unknown): value is StorageError {
	return value instanceof Error && STORAGE_ERROR in value;
}

/** The folder a handle refers to does not exist (anymore) */
export class DirectoryNotFoundError extends StorageError {}

/** The file a handle refers to does not exist (anymore) */
export class FileNotFoundError extends StorageError {}

/**
 * Reasons an IOError is raised
 *
 * - already-exists: a create or rename hit an existing entry
 * - root-deletion-forbidden: delete() was called on a protected root folder
 */
export type IOErrorReason = "already-exists" | "root-deletion-forbidden";

export interface IOErrorOptions extends StorageErrorOptions {
	reason: IOErrorReason;
}

export class IOError extends StorageError {
	readonly reason: IOErrorReason;

	constructor(message: string, options: IOErrorOptions) {
		super(message, options);
		this.reason = options.reason;
	}

	override toJSON(): Record<string, unknown> {
		return {...super.toJSON(), reason: this.reason};
	}
}

/** A caller passed a value the contract does not accept */
export class InvalidArgumentError extends StorageError {}
