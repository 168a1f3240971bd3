import { FileStreamError, sendChunk, streamFileBody } from '../http/response-writer.js'
import {
  formatServerIdentity,
  formatTemplateTimestamp,
  renderTemplate,
} from '../http/template.js'
import type { ResolvedResource } from '../http/types.js'
import type { IFileHandle, IFileSystem } from '../interfaces/filesystem.js'
import type { IHostIdentity } from '../interfaces/host-identity.js'
import type { ITcpSocket } from '../interfaces/socket.js'
import type { Logger } from '../logging/logger.js'
import { concat, decodeToString, fromString } from '../utils/buffer.js'

/** Sent in place of the rest of a body whose source failed mid-copy. */
export const BODY_ERROR_FRAGMENT = '<html><head>Bad request</head></html>'

export type ResponseBodyErrorCode =
  | 'TEMPLATE_READ'
  | 'TEMPLATE_WRITE'
  | 'FILE_READ'
  | 'NOT_FOUND_PAGE_READ'

export class ResponseBodyError extends Error {
  constructor(
    readonly code: ResponseBodyErrorCode,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`${code} failed for ${path}`, options)
    this.name = 'ResponseBodyError'
  }
}

export interface ResponseBodyWriterOptions {
  fs: IFileSystem
  identity: IHostIdentity
  /** Absolute path of the 404 page. */
  notFoundPath: string
  /** Absolute path the rendered landing page is persisted to, or null. */
  materializedPath: string | null
  clock?: () => Date
  logger?: Logger
}

/**
 * Writes the body that follows an already-sent header. Source failures are
 * logged and end the body; they never propagate. Only socket write failures
 * reject.
 */
export class ResponseBodyWriter {
  private fs: IFileSystem
  private identity: IHostIdentity
  private notFoundPath: string
  private materializedPath: string | null
  private clock: () => Date
  private logger?: Logger

  constructor(options: ResponseBodyWriterOptions) {
    this.fs = options.fs
    this.identity = options.identity
    this.notFoundPath = options.notFoundPath
    this.materializedPath = options.materializedPath
    this.clock = options.clock ?? (() => new Date())
    this.logger = options.logger
  }

  async write(socket: ITcpSocket, resource: ResolvedResource): Promise<void> {
    switch (resource.kind) {
      case 'home':
        return this.writeHome(socket, resource.templatePath)
      case 'file':
        return this.writeFile(socket, resource.path, resource.size)
      case 'missing':
        return this.writeNotFound(socket)
    }
  }

  /** Render the landing page template for the current moment. */
  async renderHome(templatePath: string): Promise<string> {
    const source = decodeToString(await readFileContents(this.fs, templatePath))
    return renderTemplate(source, {
      date: formatTemplateTimestamp(this.clock()),
      server: formatServerIdentity(this.identity.userName(), this.identity.hostAddress()),
    })
  }

  private async writeHome(socket: ITcpSocket, templatePath: string): Promise<void> {
    let page: Uint8Array
    try {
      page = fromString(await this.renderHome(templatePath))
    } catch (err) {
      this.report('TEMPLATE_READ', templatePath, err)
      await sendChunk(socket, fromString(BODY_ERROR_FRAGMENT))
      return
    }

    await this.materialize(page)
    await sendChunk(socket, page)
  }

  // Best effort: the body is served from memory whether or not this lands.
  private async materialize(page: Uint8Array): Promise<void> {
    const target = this.materializedPath
    if (target === null) return

    try {
      const handle = await this.fs.open(target, 'w')
      try {
        await handle.write(page, 0, page.length, 0)
      } finally {
        await handle.close()
      }
    } catch (err) {
      this.report('TEMPLATE_WRITE', target, err)
    }
  }

  private async writeFile(socket: ITcpSocket, filePath: string, size: number): Promise<void> {
    let handle: IFileHandle
    try {
      handle = await this.fs.open(filePath, 'r')
    } catch (err) {
      await this.abortFileBody(socket, filePath, 0, err)
      return
    }

    try {
      await streamFileBody(socket, handle, size)
    } catch (err) {
      if (!(err instanceof FileStreamError)) throw err
      await this.abortFileBody(socket, filePath, err.bytesSent, err.cause)
    } finally {
      await handle.close()
    }
  }

  private async abortFileBody(
    socket: ITcpSocket,
    filePath: string,
    bytesSent: number,
    cause: unknown,
  ): Promise<void> {
    this.report('FILE_READ', filePath, cause, `after ${bytesSent} bytes`)
    await sendChunk(socket, fromString(BODY_ERROR_FRAGMENT))
  }

  private async writeNotFound(socket: ITcpSocket): Promise<void> {
    let page: Uint8Array
    try {
      page = await readFileContents(this.fs, this.notFoundPath)
    } catch (err) {
      this.report('NOT_FOUND_PAGE_READ', this.notFoundPath, err)
      return
    }
    await sendChunk(socket, page)
  }

  private report(code: ResponseBodyErrorCode, path: string, cause: unknown, detail?: string): void {
    const error = new ResponseBodyError(code, path, { cause })
    if (detail) {
      this.logger?.error(error.message, detail, cause)
    } else {
      this.logger?.error(error.message, cause)
    }
  }
}

/** Read a whole file through the filesystem abstraction. */
export async function readFileContents(fs: IFileSystem, path: string): Promise<Uint8Array> {
  const stat = await fs.stat(path)
  const handle = await fs.open(path, 'r')
  try {
    const chunks: Uint8Array[] = []
    const buffer = new Uint8Array(64 * 1024)
    let position = 0
    while (position < stat.size) {
      const toRead = Math.min(buffer.length, stat.size - position)
      const { bytesRead } = await handle.read(buffer, 0, toRead, position)
      if (bytesRead === 0) break
      chunks.push(buffer.slice(0, bytesRead))
      position += bytesRead
    }
    return concat(chunks)
  } finally {
    await handle.close()
  }
}
