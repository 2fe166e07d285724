import {beforeEach, describe, expect, test, vi} from "vitest";
import {
	CreationCollisionOption,
	DirectoryNotFoundError,
	InvalidArgumentError,
	IOError,
	PlatformError,
	PlatformFolderHandle,
	PlatformStatus,
	type PlatformFolder,
	type PlatformStorage,
} from "../src/index.js";
import {MemoryPlatformStorage} from "../src/memory.js";

const ROOTS = ["/local", "/roaming"];
const UNKNOWN_OPTION: string = "sometimes";

describe("PlatformFolderHandle", () => {
	let storage: MemoryPlatformStorage;
	let local: PlatformFolderHandle;

	beforeEach(async () => {
		storage = new MemoryPlatformStorage(ROOTS);
		local = new PlatformFolderHandle(
			storage,
			await storage.getFolderFromPath("/local"),
			{protectedRoots: ROOTS},
		);
	});

	test("should expose name and path of the wrapped folder", () => {
		expect(local.name).toBe("local");
		expect(local.path).toBe("/local");
		expect(local.isRoot).toBe(true);
	});

	test("should compute isRoot once at construction", async () => {
		const roots = new Set<string>();
		const handle = new PlatformFolderHandle(
			storage,
			await storage.getFolderFromPath("/local"),
			{protectedRoots: roots},
		);
		roots.add("/local");

		expect(handle.isRoot).toBe(false);
	});

	describe("createFile", () => {
		test("should create an empty file", async () => {
			const file = await local.createFile(
				"notes.txt",
				CreationCollisionOption.FailIfExists,
			);

			expect(file.name).toBe("notes.txt");
			expect(file.path).toBe("/local/notes.txt");
			expect(await file.readText()).toBe("");
		});

		test("should fail with already-exists under fail-if-exists", async () => {
			await local.createFile("notes.txt", CreationCollisionOption.FailIfExists);

			const result = local.createFile(
				"notes.txt",
				CreationCollisionOption.FailIfExists,
			);
			await expect(result).rejects.toBeInstanceOf(IOError);
			await expect(result).rejects.toHaveProperty("reason", "already-exists");
			await expect(result).rejects.toHaveProperty(
				"cause.status",
				PlatformStatus.AlreadyExists,
			);
		});

		test("should return the existing file under open-if-exists", async () => {
			const first = await local.createFile(
				"notes.txt",
				CreationCollisionOption.FailIfExists,
			);
			await first.writeText("keep me");

			const second = await local.createFile(
				"notes.txt",
				CreationCollisionOption.OpenIfExists,
			);

			expect(second.path).toBe(first.path);
			expect(await second.readText()).toBe("keep me");
		});

		test("should truncate the existing file under replace-existing", async () => {
			const first = await local.createFile(
				"notes.txt",
				CreationCollisionOption.FailIfExists,
			);
			await first.writeText("old");

			const second = await local.createFile(
				"notes.txt",
				CreationCollisionOption.ReplaceExisting,
			);

			expect(second.path).toBe("/local/notes.txt");
			expect(await second.readText()).toBe("");
		});

		test("should pick a free name under generate-unique-name", async () => {
			await local.createFile("notes.txt", CreationCollisionOption.FailIfExists);

			const file = await local.createFile(
				"notes.txt",
				CreationCollisionOption.GenerateUniqueName,
			);

			expect(file.name).toBe("notes (2).txt");
		});

		test("should reject an unrecognized policy before touching storage", async () => {
			const lookup = vi.spyOn(storage, "getFolderFromPath");

			await expect(
				local.createFile("a.txt", UNKNOWN_OPTION as CreationCollisionOption),
			).rejects.toBeInstanceOf(InvalidArgumentError);
			expect(lookup).not.toHaveBeenCalled();
		});

		test("should reject names that are paths", async () => {
			await expect(
				local.createFile("../escape.txt", CreationCollisionOption.FailIfExists),
			).rejects.toBeInstanceOf(InvalidArgumentError);
			await expect(
				local.createFile("", CreationCollisionOption.FailIfExists),
			).rejects.toBeInstanceOf(InvalidArgumentError);
		});
	});

	describe("getFile", () => {
		test("should return an existing file", async () => {
			await local.createFile("notes.txt", CreationCollisionOption.FailIfExists);

			const file = await local.getFile("notes.txt");

			expect(file.path).toBe("/local/notes.txt");
		});

		test("should pass the platform not-found error through unchanged", async () => {
			const result = local.getFile("missing.txt");

			await expect(result).rejects.toBeInstanceOf(PlatformError);
			await expect(result).rejects.toHaveProperty(
				"status",
				PlatformStatus.FileNotFound,
			);
		});
	});

	describe("listFiles", () => {
		test("should be empty for a new folder", async () => {
			const folder = await local.createFolder(
				"empty",
				CreationCollisionOption.FailIfExists,
			);

			expect(await folder.listFiles()).toEqual([]);
		});

		test("should list one file after one create", async () => {
			const folder = await local.createFolder(
				"docs",
				CreationCollisionOption.FailIfExists,
			);
			await folder.createFile("readme.md", CreationCollisionOption.FailIfExists);

			const files = await folder.listFiles();

			expect(files).toHaveLength(1);
			expect(files[0].name).toBe("readme.md");
			expect(Object.isFrozen(files)).toBe(true);
		});

		test("should not list subfolders", async () => {
			await local.createFolder("docs", CreationCollisionOption.FailIfExists);

			expect(await local.listFiles()).toEqual([]);
		});
	});

	describe("createFolder", () => {
		test("should create distinct folders under generate-unique-name", async () => {
			const first = await local.createFolder(
				"sub",
				CreationCollisionOption.GenerateUniqueName,
			);
			const second = await local.createFolder(
				"sub",
				CreationCollisionOption.GenerateUniqueName,
			);

			expect(first.path).toBe("/local/sub");
			expect(second.path).toBe("/local/sub (2)");
			const names = (await local.listFolders()).map((folder) => folder.name);
			expect(names.sort()).toEqual(["sub", "sub (2)"]);
		});

		test("should fail with already-exists under fail-if-exists", async () => {
			await local.createFolder("sub", CreationCollisionOption.FailIfExists);

			await expect(
				local.createFolder("sub", CreationCollisionOption.FailIfExists),
			).rejects.toHaveProperty("reason", "already-exists");
		});

		test("should keep contents under open-if-exists", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);
			await sub.createFile("a.txt", CreationCollisionOption.FailIfExists);

			const reopened = await local.createFolder(
				"sub",
				CreationCollisionOption.OpenIfExists,
			);

			expect((await reopened.listFiles()).map((file) => file.name)).toEqual([
				"a.txt",
			]);
		});

		test("should empty the folder under replace-existing", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);
			await sub.createFile("a.txt", CreationCollisionOption.FailIfExists);

			const replaced = await local.createFolder(
				"sub",
				CreationCollisionOption.ReplaceExisting,
			);

			expect(await replaced.listFiles()).toEqual([]);
		});

		test("should reject an unrecognized policy before touching storage", async () => {
			const lookup = vi.spyOn(storage, "getFolderFromPath");

			await expect(
				local.createFolder("sub", UNKNOWN_OPTION as CreationCollisionOption),
			).rejects.toBeInstanceOf(InvalidArgumentError);
			expect(lookup).not.toHaveBeenCalled();
		});

		test("should hand the protected roots down to subfolders", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);

			expect(sub.isRoot).toBe(false);
			await sub.delete();
			expect(await local.checkExists("sub")).toBe("not-found");
		});
	});

	describe("getFolder", () => {
		test("should return an existing subfolder", async () => {
			await local.createFolder("sub", CreationCollisionOption.FailIfExists);

			const sub = await local.getFolder("sub");

			expect(sub.path).toBe("/local/sub");
			expect(sub.isRoot).toBe(false);
		});

		test("should translate platform not-found into DirectoryNotFoundError", async () => {
			const result = local.getFolder("missing");

			await expect(result).rejects.toBeInstanceOf(DirectoryNotFoundError);
			await expect(result).rejects.toHaveProperty(
				"cause.status",
				PlatformStatus.FileNotFound,
			);
		});
	});

	describe("checkExists", () => {
		test("should report the kind of a child entry", async () => {
			await local.createFile("a.txt", CreationCollisionOption.FailIfExists);
			await local.createFolder("sub", CreationCollisionOption.FailIfExists);

			expect(await local.checkExists("a.txt")).toBe("file");
			expect(await local.checkExists("sub")).toBe("folder");
			expect(await local.checkExists("nope")).toBe("not-found");
		});
	});

	describe("delete", () => {
		test("should refuse to delete a root folder", async () => {
			const result = local.delete();

			await expect(result).rejects.toBeInstanceOf(IOError);
			await expect(result).rejects.toHaveProperty(
				"reason",
				"root-deletion-forbidden",
			);
			await expect(storage.getFolderFromPath("/local")).resolves.toHaveProperty(
				"path",
				"/local",
			);
		});

		test("should refuse to delete a root folder that no longer exists", async () => {
			const folder = await storage.getFolderFromPath("/roaming");
			const roaming = new PlatformFolderHandle(storage, folder, {
				protectedRoots: ROOTS,
			});
			await folder.delete();

			await expect(roaming.delete()).rejects.toHaveProperty(
				"reason",
				"root-deletion-forbidden",
			);
		});

		test("should remove a folder and its contents", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);
			const nested = await sub.createFolder(
				"nested",
				CreationCollisionOption.FailIfExists,
			);
			await nested.createFile("a.txt", CreationCollisionOption.FailIfExists);

			await sub.delete();

			expect(await local.listFolders()).toEqual([]);
		});

		test("should fail with DirectoryNotFoundError the second time", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);
			await sub.delete();

			await expect(sub.delete()).rejects.toBeInstanceOf(DirectoryNotFoundError);
		});
	});

	describe("stale handles", () => {
		test("should fail every operation once the folder is removed out of band", async () => {
			const sub = await local.createFolder(
				"sub",
				CreationCollisionOption.FailIfExists,
			);
			await (await storage.getFolderFromPath("/local/sub")).delete();

			const {FailIfExists} = CreationCollisionOption;
			const operations: Array<() => Promise<unknown>> = [
				() => sub.createFile("a.txt", FailIfExists),
				() => sub.getFile("a.txt"),
				() => sub.listFiles(),
				() => sub.createFolder("b", FailIfExists),
				() => sub.getFolder("b"),
				() => sub.listFolders(),
				() => sub.checkExists("a.txt"),
				() => sub.delete(),
			];
			for (const operation of operations) {
				await expect(operation()).rejects.toBeInstanceOf(DirectoryNotFoundError);
			}
		});

		test("should not make the delegated platform call", async () => {
			const folder: PlatformFolder = {
				name: "gone",
				path: "/local/gone",
				createFile: vi.fn(),
				getFile: vi.fn(),
				getFiles: vi.fn(),
				createFolder: vi.fn(),
				getFolder: vi.fn(),
				getFolders: vi.fn(),
				stat: vi.fn(),
				delete: vi.fn(),
			};
			const missing: PlatformStorage = {
				getFolderFromPath: vi.fn(async (path: string) => {
					throw new PlatformError(
						PlatformStatus.FileNotFound,
						`Not found: ${path}`,
					);
				}),
				getFileFromPath: vi.fn(),
			};
			const handle = new PlatformFolderHandle(missing, folder);

			const {OpenIfExists} = CreationCollisionOption;
			await expect(handle.createFile("a", OpenIfExists)).rejects.toThrow(
				"Not found: /local/gone",
			);
			await expect(handle.getFile("a")).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.listFiles()).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.createFolder("b", OpenIfExists)).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.getFolder("b")).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.listFolders()).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.checkExists("a")).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);
			await expect(handle.delete()).rejects.toBeInstanceOf(
				DirectoryNotFoundError,
			);

			expect(missing.getFolderFromPath).toHaveBeenCalledWith("/local/gone");
			expect(folder.createFile).not.toHaveBeenCalled();
			expect(folder.getFile).not.toHaveBeenCalled();
			expect(folder.getFiles).not.toHaveBeenCalled();
			expect(folder.createFolder).not.toHaveBeenCalled();
			expect(folder.getFolder).not.toHaveBeenCalled();
			expect(folder.getFolders).not.toHaveBeenCalled();
			expect(folder.stat).not.toHaveBeenCalled();
			expect(folder.delete).not.toHaveBeenCalled();
		});
	});

	describe("error pass-through", () => {
		test("should rethrow other platform errors unchanged", async () => {
			const denied = new PlatformError(
				PlatformStatus.AccessDenied,
				"Access is denied.",
			);
			const folder = await storage.getFolderFromPath("/local");
			vi.spyOn(folder, "createFile").mockRejectedValue(denied);
			const handle = new PlatformFolderHandle(storage, folder);

			await expect(
				handle.createFile("a.txt", CreationCollisionOption.FailIfExists),
			).rejects.toBe(denied);
		});

		test("should rethrow non-platform lookup failures unchanged", async () => {
			const failure = new Error("device unplugged");
			const folder = await storage.getFolderFromPath("/local");
			vi.spyOn(storage, "getFolderFromPath").mockRejectedValue(failure);
			const handle = new PlatformFolderHandle(storage, folder);

			await expect(handle.listFiles()).rejects.toBe(failure);
		});
	});

	describe("protected roots below a folder", () => {
		const NESTED_ROOTS = ["/apps/demo/local", "/apps/demo/roaming"];
		let nested: MemoryPlatformStorage;

		async function handleFor(path: string): Promise<PlatformFolderHandle> {
			return new PlatformFolderHandle(
				nested,
				await nested.getFolderFromPath(path),
				{protectedRoots: NESTED_ROOTS},
			);
		}

		beforeEach(async () => {
			nested = new MemoryPlatformStorage(NESTED_ROOTS);
			const root = await handleFor("/apps/demo/local");
			await root.createFile("precious.txt", CreationCollisionOption.FailIfExists);
		});

		test("should refuse to replace a root folder from its parent", async () => {
			const folder = await nested.getFolderFromPath("/apps/demo");
			const create = vi.spyOn(folder, "createFolder");
			const parent = new PlatformFolderHandle(nested, folder, {
				protectedRoots: NESTED_ROOTS,
			});

			const result = parent.createFolder(
				"local",
				CreationCollisionOption.ReplaceExisting,
			);

			await expect(result).rejects.toBeInstanceOf(IOError);
			await expect(result).rejects.toHaveProperty(
				"reason",
				"root-deletion-forbidden",
			);
			expect(create).not.toHaveBeenCalled();
			const root = await handleFor("/apps/demo/local");
			expect((await root.listFiles()).map((file) => file.name)).toEqual([
				"precious.txt",
			]);
		});

		test("should refuse to replace a folder that contains a root", async () => {
			const apps = await handleFor("/apps");

			await expect(
				apps.createFolder("demo", CreationCollisionOption.ReplaceExisting),
			).rejects.toHaveProperty("reason", "root-deletion-forbidden");
			expect(await apps.checkExists("demo")).toBe("folder");
		});

		test("should still open a root folder from its parent", async () => {
			const parent = await handleFor("/apps/demo");

			const local = await parent.createFolder(
				"local",
				CreationCollisionOption.OpenIfExists,
			);

			expect(local.isRoot).toBe(true);
			expect((await local.listFiles()).map((file) => file.name)).toEqual([
				"precious.txt",
			]);
		});

		test("should replace a sibling of a root folder", async () => {
			const parent = await handleFor("/apps/demo");
			const cache = await parent.createFolder(
				"cache",
				CreationCollisionOption.FailIfExists,
			);
			await cache.createFile("a.txt", CreationCollisionOption.FailIfExists);

			const replaced = await parent.createFolder(
				"cache",
				CreationCollisionOption.ReplaceExisting,
			);

			expect(await replaced.listFiles()).toEqual([]);
		});

		test("should refuse to delete an ancestor of a root folder", async () => {
			const parent = await handleFor("/apps/demo");

			await expect(parent.delete()).rejects.toHaveProperty(
				"reason",
				"root-deletion-forbidden",
			);
			await expect(
				nested.getFolderFromPath("/apps/demo/local"),
			).resolves.toHaveProperty("path", "/apps/demo/local");
		});

		test("should not treat a name sharing a root's prefix as an ancestor", async () => {
			const demo = await handleFor("/apps/demo");
			const lookalike = await demo.createFolder(
				"loc",
				CreationCollisionOption.FailIfExists,
			);

			await lookalike.delete();

			expect(await demo.checkExists("loc")).toBe("not-found");
		});
	});
});
