import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../interfaces/filesystem.js";
import { fromString } from "../utils/buffer.js";

interface MemoryFileEntry {
  data: Uint8Array;
}

/** Injected failure for a path. */
export type FileFault =
  | { kind: "open"; mode: "r" | "w" }
  | { kind: "read"; afterBytes: number }
  | { kind: "write" };

const MAX_SYMLINK_HOPS = 32;

class InMemoryFileHandle implements IFileHandle {
  private closed = false;

  constructor(
    private readonly fileSystem: InMemoryFileSystem,
    private readonly filePath: string,
  ) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    this.ensureOpen();
    const file = this.fileSystem.getFileOrThrow(this.filePath);

    const fault = this.fileSystem.faultFor(this.filePath);
    if (fault?.kind === "read" && position >= fault.afterBytes) {
      throw new Error(`EIO: injected read failure: ${this.filePath}`);
    }

    const end = Math.min(position + length, file.data.length);
    const bytesRead = Math.max(0, end - position);
    if (bytesRead === 0) {
      return { bytesRead: 0 };
    }

    buffer.set(file.data.subarray(position, end), offset);
    return { bytesRead };
  }

  async write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }> {
    this.ensureOpen();

    if (this.fileSystem.faultFor(this.filePath)?.kind === "write") {
      throw new Error(`EIO: injected write failure: ${this.filePath}`);
    }

    const file = this.fileSystem.getFileOrThrow(this.filePath);
    const next = new Uint8Array(Math.max(file.data.length, position + length));
    next.set(file.data, 0);
    next.set(buffer.subarray(offset, offset + length), position);
    this.fileSystem.setFile(this.filePath, next);

    return { bytesWritten: length };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("File handle is closed");
    }
  }
}

/**
 * Filesystem held in maps, with symlinks and injectable I/O faults. Paths
 * are POSIX-style and absolute.
 */
export class InMemoryFileSystem implements IFileSystem {
  private readonly files = new Map<string, MemoryFileEntry>();
  private readonly directories = new Set<string>(["/"]);
  private readonly symlinks = new Map<string, string>();
  private readonly faults = new Map<string, FileFault>();

  async open(path: string, mode: "r" | "w"): Promise<IFileHandle> {
    const resolved = this.resolveLinks(normalizePath(path));

    if (this.directories.has(resolved)) {
      throw new Error(`EISDIR: cannot open directory as file: ${resolved}`);
    }

    const fault = this.faults.get(resolved);
    if (fault?.kind === "open" && fault.mode === mode) {
      throw new Error(`EACCES: injected open failure: ${resolved}`);
    }

    if (mode === "r") {
      this.getFileOrThrow(resolved);
      return new InMemoryFileHandle(this, resolved);
    }

    this.ensureDirectory(parentDirectory(resolved));
    this.setFile(resolved, new Uint8Array(0));
    return new InMemoryFileHandle(this, resolved);
  }

  async stat(path: string): Promise<IFileStat> {
    const resolved = this.resolveLinks(normalizePath(path));

    const file = this.files.get(resolved);
    if (file) {
      return {
        size: file.data.length,
        isDirectory: false,
        isFile: true,
      };
    }

    if (this.directories.has(resolved)) {
      return {
        size: 0,
        isDirectory: true,
        isFile: false,
      };
    }

    throw new Error(`ENOENT: no such file or directory: ${resolved}`);
  }

  async exists(path: string): Promise<boolean> {
    const resolved = this.resolveLinks(normalizePath(path));
    return this.files.has(resolved) || this.directories.has(resolved);
  }

  async realpath(path: string): Promise<string> {
    const resolved = this.resolveLinks(normalizePath(path));
    if (!this.files.has(resolved) && !this.directories.has(resolved)) {
      throw new Error(`ENOENT: no such file or directory: ${resolved}`);
    }
    return resolved;
  }

  async mkdir(path: string): Promise<void> {
    this.ensureDirectory(normalizePath(path));
  }

  /** Create or replace a file; parents are created as needed. */
  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    const normalized = normalizePath(path);
    this.ensureDirectory(parentDirectory(normalized));
    this.setFile(
      normalized,
      typeof data === "string" ? fromString(data) : data.slice(),
    );
  }

  async readFile(path: string): Promise<Uint8Array> {
    const file = this.getFileOrThrow(this.resolveLinks(normalizePath(path)));
    return file.data.slice();
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    const normalized = normalizePath(linkPath);
    this.ensureDirectory(parentDirectory(normalized));
    this.symlinks.set(normalized, normalizePath(target));
  }

  /** Make later operations on `path` fail. */
  injectFault(path: string, fault: FileFault): void {
    this.faults.set(normalizePath(path), fault);
  }

  clearFaults(): void {
    this.faults.clear();
  }

  faultFor(path: string): FileFault | undefined {
    return this.faults.get(path);
  }

  getFileOrThrow(path: string): MemoryFileEntry {
    const file = this.files.get(path);
    if (!file) {
      throw new Error(`ENOENT: file does not exist: ${path}`);
    }
    return file;
  }

  setFile(path: string, data: Uint8Array): MemoryFileEntry {
    const entry: MemoryFileEntry = { data };
    this.files.set(path, entry);
    return entry;
  }

  // Follows links component by component, like realpath(3).
  private resolveLinks(path: string): string {
    let current = path;
    for (let hops = 0; hops < MAX_SYMLINK_HOPS; hops++) {
      const segments = current === "/" ? [] : current.slice(1).split("/");
      let prefix = "";
      let rewritten: string | null = null;

      for (let i = 0; i < segments.length; i++) {
        prefix = `${prefix}/${segments[i]}`;
        const target = this.symlinks.get(prefix);
        if (target !== undefined) {
          const rest = segments.slice(i + 1).join("/");
          rewritten = normalizePath(rest ? `${target}/${rest}` : target);
          break;
        }
      }

      if (rewritten === null) return current;
      current = rewritten;
    }
    throw new Error(`ELOOP: too many symbolic links: ${path}`);
  }

  private ensureDirectory(path: string): void {
    const segments = path === "/" ? [] : path.slice(1).split("/");
    let current = "";
    for (const segment of segments) {
      current = `${current}/${segment}`;
      if (this.files.has(current)) {
        throw new Error(
          `ENOTDIR: file exists where directory expected: ${current}`,
        );
      }
      this.directories.add(current);
    }
  }
}

function normalizePath(path: string): string {
  const output: string[] = [];

  for (const part of path.split("/")) {
    if (part === "" || part === ".") {
      continue;
    }
    if (part === "..") {
      output.pop();
      continue;
    }
    output.push(part);
  }

  return output.length === 0 ? "/" : `/${output.join("/")}`;
}

function parentDirectory(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx <= 0 ? "/" : path.slice(0, idx);
}
