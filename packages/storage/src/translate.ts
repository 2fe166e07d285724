/**
 * Translation between the uniform vocabulary and the platform's
 */

import {
	DirectoryNotFoundError,
	FileNotFoundError,
	IOError,
	InvalidArgumentError,
} from "./errors.js";
import {
	isPlatformAlreadyExists,
	isPlatformNotFound,
	isValidName,
	type PlatformCreationOption,
	type PlatformNameOption,
} from "./platform.js";
import {
	CreationCollisionOption,
	NameCollisionOption,
} from "./types.js";

export function toPlatformCreationOption(
	option: CreationCollisionOption,
): PlatformCreationOption {
	switch (option) {
		case CreationCollisionOption.GenerateUniqueName:
			return "generateUniqueName";
		case CreationCollisionOption.ReplaceExisting:
			return "replaceExisting";
		case CreationCollisionOption.FailIfExists:
			return "failIfExists";
		case CreationCollisionOption.OpenIfExists:
			return "openIfExists";
		default:
			throw new InvalidArgumentError(
				`Unrecognized CreationCollisionOption value: ${String(option)}`,
			);
	}
}

export function toPlatformNameOption(
	option: NameCollisionOption,
): PlatformNameOption {
	switch (option) {
		case NameCollisionOption.GenerateUniqueName:
			return "generateUniqueName";
		case NameCollisionOption.ReplaceExisting:
			return "replaceExisting";
		case NameCollisionOption.FailIfExists:
			return "failIfExists";
		default:
			throw new InvalidArgumentError(
				`Unrecognized NameCollisionOption value: ${String(option)}`,
			);
	}
}

export function assertValidName(name: string): void {
	if (!isValidName(name)) {
		throw new InvalidArgumentError(`Invalid name: ${JSON.stringify(name)}`);
	}
}

/**
 * The platform reports a name clash only through its AlreadyExists status
 * (0x800700B7). That status is the single place a create or rename failure
 * is reinterpreted; everything else is returned as-is for the caller to
 * rethrow.
 */
export function translateAlreadyExists(error: unknown): unknown {
	if (isPlatformAlreadyExists(error)) {
		return new IOError(error.message, {reason: "already-exists", cause: error});
	}
	return error;
}

export function translateFolderNotFound(error: unknown): unknown {
	if (isPlatformNotFound(error)) {
		return new DirectoryNotFoundError(error.message, {cause: error});
	}
	return error;
}

export function translateFileNotFound(error: unknown): unknown {
	if (isPlatformNotFound(error)) {
		return new FileNotFoundError(error.message, {cause: error});
	}
	return error;
}
