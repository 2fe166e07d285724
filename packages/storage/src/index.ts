/**
 * Portable folder and file access over pluggable platform bindings
 */

export {
	CreationCollisionOption,
	NameCollisionOption,
	type ExistenceCheckResult,
	type FileHandle,
	type FileSystem,
	type FolderHandle,
} from "./types.js";

export {
	DirectoryNotFoundError,
	FileNotFoundError,
	InvalidArgumentError,
	IOError,
	isStorageError,
	StorageError,
	type IOErrorOptions,
	type IOErrorReason,
	type StorageErrorOptions,
} from "./errors.js";

export {
	isPlatformAlreadyExists,
	isPlatformNotFound,
	isValidName,
	PlatformError,
	PlatformStatus,
	uniqueNameCandidates,
	type PlatformCreationOption,
	type PlatformErrorOptions,
	type PlatformFile,
	type PlatformFolder,
	type PlatformNameOption,
	type PlatformStorage,
} from "./platform.js";

export {PlatformFileHandle} from "./file.js";
export {
	PlatformFolderHandle,
	type PlatformFolderHandleOptions,
} from "./folder.js";
export {
	PlatformFileSystem,
	type PlatformFileSystemOptions,
} from "./filesystem.js";
export {
	configureLogging,
	type LoggingConfig,
	type StowageCategory,
} from "./logging.js";
