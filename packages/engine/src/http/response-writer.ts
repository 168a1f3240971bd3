import type { IFileHandle } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { fromString } from "../utils/buffer.js";
import { type ResponseHeader, STATUS_TEXT } from "./types.js";

const LINE_END = "\n";
const CHUNK_SIZE = 64 * 1024; // 64KB chunks

/**
 * Serialize the header block. Every line ends with `\n` and the block ends
 * with one empty line.
 */
export function buildHeaderBytes(header: ResponseHeader): Uint8Array {
  const lines: string[] = [
    `HTTP/1.1 ${header.status} ${STATUS_TEXT[header.status]}`,
    `Date: ${header.date.toUTCString()}`,
    `Server: ${header.server}`,
    "Connection: close",
    `Content-Type: ${header.contentType}`,
  ];
  return fromString(lines.join(LINE_END) + LINE_END + LINE_END);
}

/**
 * Write the complete header block. Must be awaited before any body byte is
 * sent.
 */
export async function writeResponseHeader(
  socket: ITcpSocket,
  header: ResponseHeader,
): Promise<void> {
  await sendChunk(socket, buildHeaderBytes(header));
}

/** A file read failed partway through a streamed body. */
export class FileStreamError extends Error {
  constructor(
    readonly bytesSent: number,
    options?: { cause?: unknown },
  ) {
    super(`File read failed after ${bytesSent} bytes`, options);
    this.name = "FileStreamError";
  }
}

/**
 * Stream file contents in chunks. Resolves with the number of bytes sent.
 * A failed read rejects with FileStreamError and leaves whatever was already
 * sent in place; socket failures reject with the socket's own error.
 */
export async function streamFileBody(
  socket: ITcpSocket,
  fileHandle: IFileHandle,
  fileSize: number,
): Promise<number> {
  const buffer = new Uint8Array(Math.min(CHUNK_SIZE, Math.max(fileSize, 1)));
  let position = 0;

  while (position < fileSize) {
    const toRead = Math.min(buffer.length, fileSize - position);
    let bytesRead: number;
    try {
      ({ bytesRead } = await fileHandle.read(buffer, 0, toRead, position));
    } catch (err) {
      throw new FileStreamError(position, { cause: err });
    }
    if (bytesRead === 0) break;

    await sendChunk(socket, buffer.slice(0, bytesRead));
    position += bytesRead;
  }

  return position;
}

export async function sendChunk(
  socket: ITcpSocket,
  data: Uint8Array,
): Promise<void> {
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}
