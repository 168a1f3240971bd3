/**
 * Abstract File System Interfaces
 *
 * Decouples file operations from any specific runtime so the request
 * pipeline can be exercised against an in-memory tree in tests.
 */

export interface IFileStat {
  size: number
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file. Mode 'w' creates or truncates. */
  open(path: string, mode: 'r' | 'w'): Promise<IFileHandle>

  /** Get file statistics. Rejects when the path does not exist. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Canonical path with symlinks resolved. */
  realpath(path: string): Promise<string>
}
