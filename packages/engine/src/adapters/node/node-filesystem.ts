import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../../interfaces/filesystem.js";

export class NodeFileHandle implements IFileHandle {
  constructor(private handle: fs.FileHandle) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    const result = await this.handle.read(buffer, offset, length, position);
    return { bytesRead: result.bytesRead };
  }

  async write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }> {
    const result = await this.handle.write(buffer, offset, length, position);
    return { bytesWritten: result.bytesWritten };
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

export class NodeFileSystem implements IFileSystem {
  async open(filePath: string, mode: "r" | "w"): Promise<IFileHandle> {
    if (mode === "w") {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }

    const handle = await fs.open(filePath, mode === "w" ? "w+" : "r");
    return new NodeFileHandle(handle);
  }

  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async realpath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }
}
