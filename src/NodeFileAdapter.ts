import { promises as fs } from "fs";
import { dirname } from "path";
import type { IFileAdapter } from "./debug";

function isMissing(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}

/** Log file sink over the local filesystem. */
export class NodeFileAdapter implements IFileAdapter {
	async append(path: string, content: string): Promise<void> {
		await fs.mkdir(dirname(path), { recursive: true });
		await fs.appendFile(path, content, "utf8");
	}

	async stat(path: string): Promise<{ size: number } | null> {
		try {
			const stats = await fs.stat(path);
			return { size: stats.size };
		} catch (e) {
			if (isMissing(e)) return null;
			throw e;
		}
	}

	async exists(path: string): Promise<boolean> {
		return (await this.stat(path)) !== null;
	}

	async remove(path: string): Promise<void> {
		await fs.rm(path, { force: true });
	}

	async rename(oldPath: string, newPath: string): Promise<void> {
		await fs.rename(oldPath, newPath);
	}

	async write(path: string, content: string): Promise<void> {
		await fs.mkdir(dirname(path), { recursive: true });
		await fs.writeFile(path, content, "utf8");
	}

	async read(path: string): Promise<string> {
		return fs.readFile(path, "utf8");
	}
}
