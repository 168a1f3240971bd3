export interface CliArgs {
  root: string;
  port: number;
  host: string;
  quiet: boolean;
  verbose: boolean;
  timeoutMs?: number;
  serverName?: string;
  contentType?: string;
  templateFile?: string;
  notFoundFile?: string;
  materialize: boolean;
  help: boolean;
  version: boolean;
}

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    root: ".",
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    verbose: false,
    materialize: true,
    help: false,
    version: false,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined) {
      throw new CliArgsError(`Missing value for ${flag}`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      parsed.port = parseInteger(arg, valueFor(arg, ++i));
      if (parsed.port > 65535) {
        throw new CliArgsError("Invalid port number");
      }
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = valueFor(arg, ++i);
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--verbose" || arg === "-V") {
      parsed.verbose = true;
    } else if (arg === "--timeout") {
      parsed.timeoutMs = parseInteger(arg, valueFor(arg, ++i));
    } else if (arg === "--server-name") {
      parsed.serverName = valueFor(arg, ++i);
    } else if (arg === "--content-type") {
      parsed.contentType = valueFor(arg, ++i);
    } else if (arg === "--template") {
      parsed.templateFile = valueFor(arg, ++i);
    } else if (arg === "--not-found") {
      parsed.notFoundFile = valueFor(arg, ++i);
    } else if (arg === "--no-materialize") {
      parsed.materialize = false;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (!arg.startsWith("-")) {
      parsed.root = arg;
    } else {
      throw new CliArgsError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

function parseInteger(flag: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0 || String(value) !== raw) {
    throw new CliArgsError(`Invalid value for ${flag}: ${raw}`);
  }
  return value;
}

export const HELP_TEXT = `
hearthd - answer each connection with a page, a file, or a 404

Usage: hearthd [directory] [options]

Options:
  --port, -p <port>       Port to listen on (default: 8080)
  --host, -H <host>       Host to bind (default: 127.0.0.1)
  --quiet, -q             Suppress request logging
  --verbose, -V           Log connection and header details
  --timeout <ms>          Give up reading a request after <ms> (default: wait)
  --server-name <name>    Server header value (default: hearthd)
  --content-type <type>   Content-Type for every response (default: text/html)
  --template <file>       Landing page template (default: TestBase.html)
  --not-found <file>      404 page (default: notFound.html)
  --no-materialize        Do not write the rendered landing page to disk
  --version, -v           Show version
  --help, -h              Show this help
`;
