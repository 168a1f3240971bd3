export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Document root that request paths resolve against. */
  root: string;
  /** Landing page template, relative to root. Default: 'TestBase.html' */
  templateFile: string;
  /**
   * Where the rendered landing page is persisted, relative to root.
   * `null` disables persistence. Default: 'Test.html'
   */
  materializedFile: string | null;
  /** Body of every 404 response, relative to root. Default: 'notFound.html' */
  notFoundFile: string;
  /** Content-Type sent with every response. Default: 'text/html' */
  contentType: string;
  /** Value of the Server header. Default: 'hearthd' */
  serverName: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Deadline for reading the request head; 0 waits forever. Default: 0 */
  requestTimeoutMs: number;
  /** Longest request or header line accepted. Default: 8KB */
  maxLineSize: number;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    templateFile: "TestBase.html",
    materializedFile: "Test.html",
    notFoundFile: "notFound.html",
    contentType: "text/html",
    serverName: "hearthd",
    quiet: false,
    requestTimeoutMs: 0,
    maxLineSize: 8 * 1024,
  };
}
