import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfByte } from "../utils/buffer.js";

const LF = 10;
const DEFAULT_MAX_LINE_SIZE = 8 * 1024; // 8KB

export interface ReadRequestOptions {
  /** Deadline for the whole head; 0 or less waits indefinitely. */
  timeoutMs?: number;
  maxLineSize?: number;
}

export interface RequestHead {
  /** First line of the request, without its terminator. */
  requestLine: string;
  /** Lines between the request line and the blank terminator. */
  headerLines: string[];
  /** Set when the stream failed while the header lines were being discarded. */
  incomplete?: RequestReadError;
}

export type RequestReadErrorCode =
  | "CONNECTION_CLOSED"
  | "STREAM_ERROR"
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "LINE_TOO_LONG";

export class RequestReadError extends Error {
  constructor(
    readonly code: RequestReadErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RequestReadError";
  }
}

/**
 * Line-oriented reader over a socket. Buffers whatever chunks arrive and
 * hands out `\n`-terminated lines with any trailing `\r` removed.
 */
export class RequestReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private receivedData = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.receivedData = true;
      this.notifyWaiters();
    });

    socket.onEnd?.(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /**
   * Read the request line, then consume header lines up to the blank line
   * that ends the head. Rejects only if no request line could be read.
   */
  async readHead(options?: ReadRequestOptions): Promise<RequestHead> {
    const timeoutMs = options?.timeoutMs ?? 0;
    const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : null;
    const maxLineSize = options?.maxLineSize ?? DEFAULT_MAX_LINE_SIZE;

    const requestLine = await this.readLine(deadline, maxLineSize);
    if (requestLine === null) {
      throw new RequestReadError("CONNECTION_CLOSED", "Connection closed");
    }

    const headerLines: string[] = [];
    while (true) {
      let line: string | null;
      try {
        line = await this.readLine(deadline, maxLineSize);
      } catch (err) {
        if (err instanceof RequestReadError) {
          return { requestLine, headerLines, incomplete: err };
        }
        throw err;
      }

      if (line === null || line.length === 0) {
        break;
      }
      headerLines.push(line);
    }

    return { requestLine, headerLines };
  }

  /**
   * Next line from the stream, or null once the stream has ended and
   * nothing is buffered.
   */
  async readLine(
    deadline: number | null,
    maxLineSize: number = DEFAULT_MAX_LINE_SIZE,
  ): Promise<string | null> {
    while (true) {
      const lineEnd = indexOfByte(this.buffer, LF);
      // Counted up to the LF whether or not the line has ended yet.
      if (lineEnd > maxLineSize) {
        throw new RequestReadError("LINE_TOO_LONG", "Request line too long");
      }
      if (lineEnd !== -1) {
        const line = this.buffer.subarray(0, lineEnd);
        this.buffer = this.buffer.slice(lineEnd + 1);
        return stripCarriageReturn(decodeToString(line));
      }

      if (this.buffer.length > maxLineSize) {
        throw new RequestReadError("LINE_TOO_LONG", "Request line too long");
      }

      if (this.socketError) {
        throw new RequestReadError("STREAM_ERROR", "Request stream failed", {
          cause: this.socketError,
        });
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          return null;
        }
        // Unterminated final line
        const rest = this.buffer;
        this.buffer = new Uint8Array(0);
        return stripCarriageReturn(decodeToString(rest));
      }

      const hadActivity = await this.waitForActivity(deadline);
      if (!hadActivity) {
        if (!this.receivedData) {
          throw new RequestReadError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new RequestReadError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(deadline: number | null): Promise<boolean> {
    if (deadline === null) {
      return new Promise((resolve) => {
        this.waiters.push(() => resolve(true));
      });
    }

    const timeoutMs = deadline - Date.now();
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Read a single request head from a socket.
 */
export function readRequestHead(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<RequestHead> {
  return new RequestReader(socket).readHead(options);
}
