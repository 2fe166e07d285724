/**
 * In-memory platform binding
 *
 * Provides MemoryPlatformStorage, a PlatformStorage backed by in-memory data
 * structures. Folders and files are looked up by path on every call, so a
 * reference to something that was deleted fails the same way a disk-backed
 * one would.
 */

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
} from "./platform.js";

const logger = getLogger(["stowage", "memory"]);

/**
 * In-memory file data
 */
interface MemoryFile {
	content: Uint8Array;
	lastModified: number;
}

/**
 * In-memory directory data
 */
interface MemoryDirectory {
	files: Map<string, MemoryFile>;
	directories: Map<string, MemoryDirectory>;
}

function createDirectory(): MemoryDirectory {
	return {files: new Map(), directories: new Map()};
}

function createFile(content = new Uint8Array(0)): MemoryFile {
	return {content, lastModified: Date.now()};
}

function normalizePath(path: string): string {
	return "/" + path.split("/").filter(Boolean).join("/");
}

function joinPath(base: string, name: string): string {
	if (base === "/" || base === "") {
		return `/${name}`;
	}
	return `${base}/${name}`;
}

function dirname(path: string): string {
	return "/" + path.split("/").filter(Boolean).slice(0, -1).join("/");
}

function basename(path: string): string {
	return path.split("/").filter(Boolean).pop() || "root";
}

function notFound(path: string): PlatformError {
	return new PlatformError(PlatformStatus.FileNotFound, `Not found: ${path}`);
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

/**
 * Path resolution over the in-memory tree
 */
class MemoryTree {
	readonly root: MemoryDirectory = createDirectory();

	directory(path: string): MemoryDirectory {
		let current = this.root;
		for (const part of path.split("/").filter(Boolean)) {
			const next = current.directories.get(part);
			if (!next) throw notFound(path);
			current = next;
		}
		return current;
	}

	parent(path: string): {parent: MemoryDirectory; name: string} {
		const parts = path.split("/").filter(Boolean);
		const name = parts.pop();
		if (name === undefined) {
			throw new PlatformError(
				PlatformStatus.AccessDenied,
				"The storage root has no parent",
			);
		}
		return {parent: this.directory("/" + parts.join("/")), name};
	}

	file(path: string): MemoryFile {
		const {parent, name} = this.parent(path);
		const file = parent.files.get(name);
		if (!file) throw notFound(path);
		return file;
	}

	mkdirp(path: string): void {
		let current = this.root;
		for (const part of path.split("/").filter(Boolean)) {
			let next = current.directories.get(part);
			if (!next) {
				next = createDirectory();
				current.directories.set(part, next);
			}
			current = next;
		}
	}
}

function isTaken(directory: MemoryDirectory, name: string): boolean {
	return directory.files.has(name) || directory.directories.has(name);
}

/**
 * Pick the name a create should use under the given policy, or throw.
 * Returns existing: true when open-if-exists found an entry of the right
 * kind.
 */
function claimName(
	directory: MemoryDirectory,
	path: string,
	desiredName: string,
	option: PlatformCreationOption,
	kind: "file" | "directory",
): {name: string; existing: boolean} {
	const sameKind =
		kind === "file"
			? directory.files.has(desiredName)
			: directory.directories.has(desiredName);

	switch (option) {
		case "generateUniqueName":
			for (const candidate of uniqueNameCandidates(desiredName)) {
				if (!isTaken(directory, candidate)) {
					return {name: candidate, existing: false};
				}
			}
			// uniqueNameCandidates never ends
			throw alreadyExists(joinPath(path, desiredName));
		case "failIfExists":
			if (isTaken(directory, desiredName)) {
				throw alreadyExists(joinPath(path, desiredName));
			}
			return {name: desiredName, existing: false};
		case "openIfExists":
		case "replaceExisting":
			if (isTaken(directory, desiredName) && !sameKind) {
				throw alreadyExists(joinPath(path, desiredName));
			}
			return {
				name: desiredName,
				existing: sameKind && option === "openIfExists",
			};
	}
}

class MemoryPlatformFile implements PlatformFile {
	readonly name: string;
	readonly path: string;
	#tree: MemoryTree;

	constructor(tree: MemoryTree, path: string) {
		this.#tree = tree;
		this.path = path;
		this.name = basename(path);
	}

	async readBytes(): Promise<Uint8Array> {
		return this.#tree.file(this.path).content.slice();
	}

	async writeBytes(data: Uint8Array): Promise<void> {
		const file = this.#tree.file(this.path);
		file.content = data.slice();
		file.lastModified = Date.now();
	}

	async rename(
		desiredName: string,
		option: PlatformNameOption,
	): Promise<PlatformFile> {
		checkName(desiredName);
		const {parent, name} = this.#tree.parent(this.path);
		const file = parent.files.get(name);
		if (!file) throw notFound(this.path);
		if (desiredName === name) return this;

		const parentPath = dirname(this.path);
		let target = desiredName;
		if (option === "generateUniqueName") {
			for (const candidate of uniqueNameCandidates(desiredName)) {
				if (!isTaken(parent, candidate)) {
					target = candidate;
					break;
				}
			}
		} else if (
			(option === "failIfExists" && isTaken(parent, desiredName)) ||
			parent.directories.has(desiredName)
		) {
			throw alreadyExists(joinPath(parentPath, desiredName));
		}

		parent.files.delete(name);
		parent.files.set(target, file);
		logger.debug("Renamed file", {path: this.path, target});
		return new MemoryPlatformFile(this.#tree, joinPath(parentPath, target));
	}

	async delete(): Promise<void> {
		const {parent, name} = this.#tree.parent(this.path);
		if (!parent.files.delete(name)) throw notFound(this.path);
	}
}

class MemoryPlatformFolder implements PlatformFolder {
	readonly name: string;
	readonly path: string;
	#tree: MemoryTree;

	constructor(tree: MemoryTree, path: string) {
		this.#tree = tree;
		this.path = path;
		this.name = basename(path);
	}

	async createFile(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFile> {
		checkName(desiredName);
		const directory = this.#tree.directory(this.path);
		const {name, existing} = claimName(
			directory,
			this.path,
			desiredName,
			option,
			"file",
		);
		if (!existing) {
			directory.files.set(name, createFile());
		}
		return new MemoryPlatformFile(this.#tree, joinPath(this.path, name));
	}

	async getFile(name: string): Promise<PlatformFile> {
		checkName(name);
		const path = joinPath(this.path, name);
		if (!this.#tree.directory(this.path).files.has(name)) throw notFound(path);
		return new MemoryPlatformFile(this.#tree, path);
	}

	async getFiles(): Promise<PlatformFile[]> {
		const directory = this.#tree.directory(this.path);
		return Array.from(
			directory.files.keys(),
			(name) => new MemoryPlatformFile(this.#tree, joinPath(this.path, name)),
		);
	}

	async createFolder(
		desiredName: string,
		option: PlatformCreationOption,
	): Promise<PlatformFolder> {
		checkName(desiredName);
		const directory = this.#tree.directory(this.path);
		const {name, existing} = claimName(
			directory,
			this.path,
			desiredName,
			option,
			"directory",
		);
		if (!existing) {
			directory.directories.set(name, createDirectory());
		}
		return new MemoryPlatformFolder(this.#tree, joinPath(this.path, name));
	}

	async getFolder(name: string): Promise<PlatformFolder> {
		checkName(name);
		const path = joinPath(this.path, name);
		if (!this.#tree.directory(this.path).directories.has(name)) {
			throw notFound(path);
		}
		return new MemoryPlatformFolder(this.#tree, path);
	}

	async getFolders(): Promise<PlatformFolder[]> {
		const directory = this.#tree.directory(this.path);
		return Array.from(
			directory.directories.keys(),
			(name) => new MemoryPlatformFolder(this.#tree, joinPath(this.path, name)),
		);
	}

	async stat(name: string): Promise<{kind: "file" | "directory"} | null> {
		const directory = this.#tree.directory(this.path);
		if (directory.files.has(name)) return {kind: "file"};
		if (directory.directories.has(name)) return {kind: "directory"};
		return null;
	}

	async delete(): Promise<void> {
		const {parent, name} = this.#tree.parent(this.path);
		if (!parent.directories.delete(name)) throw notFound(this.path);
		logger.debug("Deleted folder", {path: this.path});
	}
}

/**
 * In-memory storage subsystem. The given root paths are created up front.
 */
export class MemoryPlatformStorage implements PlatformStorage {
	#tree: MemoryTree;

	constructor(rootPaths: Iterable<string> = []) {
		this.#tree = new MemoryTree();
		for (const path of rootPaths) {
			this.#tree.mkdirp(path);
		}
	}

	async getFolderFromPath(path: string): Promise<PlatformFolder> {
		const normalized = normalizePath(path);
		this.#tree.directory(normalized);
		return new MemoryPlatformFolder(this.#tree, normalized);
	}

	async getFileFromPath(path: string): Promise<PlatformFile> {
		const normalized = normalizePath(path);
		this.#tree.file(normalized);
		return new MemoryPlatformFile(this.#tree, normalized);
	}
}
