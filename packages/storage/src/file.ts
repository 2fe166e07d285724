import {getLogger} from "@logtape/logtape";
import type {PlatformFile} from "./platform.js";
import {
	assertValidName,
	toPlatformNameOption,
	translateAlreadyExists,
	translateFileNotFound,
} from "./translate.js";
import {NameCollisionOption, type FileHandle} from "./types.js";

const logger = getLogger(["stowage", "file"]);

/**
 * File handle over a platform file reference
 */
export class PlatformFileHandle implements FileHandle {
	#file: PlatformFile;

	constructor(file: PlatformFile) {
		this.#file = file;
	}

	get name(): string {
		return this.#file.name;
	}

	get path(): string {
		return this.#file.path;
	}

	async readBytes(): Promise<Uint8Array> {
		try {
			return await this.#file.readBytes();
		} catch (error) {
			throw translateFileNotFound(error);
		}
	}

	async writeBytes(data: Uint8Array): Promise<void> {
		logger.debug("Writing file", {path: this.path, bytes: data.byteLength});
		try {
			await this.#file.writeBytes(data);
		} catch (error) {
			throw translateFileNotFound(error);
		}
	}

	async readText(): Promise<string> {
		return new TextDecoder().decode(await this.readBytes());
	}

	async writeText(text: string): Promise<void> {
		await this.writeBytes(new TextEncoder().encode(text));
	}

	async rename(
		newName: string,
		option: NameCollisionOption = NameCollisionOption.FailIfExists,
	): Promise<FileHandle> {
		const platformOption = toPlatformNameOption(option);
		assertValidName(newName);
		logger.debug("Renaming file", {path: this.path, newName, option});

		let renamed: PlatformFile;
		try {
			renamed = await this.#file.rename(newName, platformOption);
		} catch (error) {
			throw translateFileNotFound(translateAlreadyExists(error));
		}
		return new PlatformFileHandle(renamed);
	}

	async delete(): Promise<void> {
		logger.debug("Deleting file", {path: this.path});
		try {
			await this.#file.delete();
		} catch (error) {
			throw translateFileNotFound(error);
		}
	}
}
