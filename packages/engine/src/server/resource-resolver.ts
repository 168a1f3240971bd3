import { MalformedRequestError, parseRequestPath } from '../http/request-line.js'
import type { MissingReason, ResolvedResource } from '../http/types.js'
import type { IFileStat, IFileSystem } from '../interfaces/filesystem.js'
import type { Logger } from '../logging/logger.js'

export interface ResourceResolverOptions {
  root: string
  fs: IFileSystem
  /** Landing page template, relative to root. */
  templateFile: string
  logger?: Logger
}

/**
 * Classifies a request line as the landing page, a file under the document
 * root, or missing. Nothing is cached: every call looks at the filesystem.
 */
export class ResourceResolver {
  private root: string
  private fs: IFileSystem
  private templateFile: string
  private logger?: Logger

  constructor(options: ResourceResolverOptions) {
    this.root = options.root.replace(/\/+$/, '')
    this.fs = options.fs
    this.templateFile = options.templateFile
    this.logger = options.logger
  }

  /** Absolute path of a root-relative file name. */
  pathFor(relative: string): string {
    return `${this.root}/${relative.replace(/^\/+/, '')}`
  }

  async resolve(requestLine: string | null): Promise<ResolvedResource> {
    if (requestLine === null) {
      return missing('no-request')
    }

    let requestPath: string
    try {
      requestPath = parseRequestPath(requestLine)
    } catch (err) {
      if (err instanceof MalformedRequestError) {
        this.logger?.debug(err.message)
        return missing('malformed-request')
      }
      throw err
    }

    if (requestPath === '') {
      const templatePath = this.pathFor(this.templateFile)
      if (await this.isRegularFile(templatePath)) {
        return { kind: 'home', templatePath }
      }
      this.logger?.warn(`Landing page template not found: ${templatePath}`)
      return missing('no-template')
    }

    const segments = decodeRequestPath(requestPath)
    if (segments === 'malformed') return missing('malformed-request')
    if (segments === 'outside-root') return missing('outside-root')

    const fsPath = segments.length === 0 ? this.root : this.pathFor(segments.join('/'))

    let stat: IFileStat
    try {
      stat = await this.fs.stat(fsPath)
    } catch {
      return missing('not-found')
    }

    if (!stat.isFile) {
      return missing('not-a-file')
    }

    if (!(await this.isInsideRoot(fsPath))) {
      this.logger?.warn(`Refusing path outside document root: ${fsPath}`)
      return missing('outside-root')
    }

    return { kind: 'file', path: fsPath, size: stat.size }
  }

  private async isRegularFile(path: string): Promise<boolean> {
    try {
      return (await this.fs.stat(path)).isFile
    } catch {
      return false
    }
  }

  // Symlinks may point anywhere; compare canonical locations.
  private async isInsideRoot(fsPath: string): Promise<boolean> {
    try {
      const [realRoot, realPath] = await Promise.all([
        this.fs.realpath(this.root === '' ? '/' : this.root),
        this.fs.realpath(fsPath),
      ])
      const prefix = realRoot.endsWith('/') ? realRoot : `${realRoot}/`
      return realPath.startsWith(prefix)
    } catch (err) {
      this.logger?.debug('Could not canonicalize path:', fsPath, err)
      return false
    }
  }
}

function missing(reason: MissingReason): ResolvedResource {
  return { kind: 'missing', reason }
}

/**
 * Turn the raw request path into root-relative segments. Query string and
 * fragment are dropped, percent-escapes decoded, `.` and `..` folded.
 */
function decodeRequestPath(
  requestPath: string,
): string[] | 'malformed' | 'outside-root' {
  const pathPart = requestPath.split('?')[0].split('#')[0]

  let decoded: string
  try {
    decoded = decodeURIComponent(pathPart)
  } catch {
    return 'malformed'
  }

  if (decoded.includes('\0')) {
    return 'malformed'
  }

  const resolved: string[] = []
  for (const seg of decoded.split('/')) {
    if (seg === '' || seg === '.') continue
    if (seg === '..') {
      if (resolved.length === 0) return 'outside-root'
      resolved.pop()
      continue
    }
    resolved.push(seg)
  }
  return resolved
}
