import * as path from "node:path";
import {
  basicLogger,
  defaultConfig,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
} from "@hearthd/engine";
import type { CliArgs } from "./args.js";

export function buildConfig(args: CliArgs): ServerConfig {
  const base = defaultConfig(path.resolve(args.root));
  return {
    ...base,
    port: args.port,
    host: args.host,
    quiet: args.quiet,
    requestTimeoutMs: args.timeoutMs ?? base.requestTimeoutMs,
    serverName: args.serverName ?? base.serverName,
    contentType: args.contentType ?? base.contentType,
    templateFile: args.templateFile ?? base.templateFile,
    notFoundFile: args.notFoundFile ?? base.notFoundFile,
    materializedFile: args.materialize ? base.materializedFile : null,
  };
}

export function buildLogger(args: CliArgs): Logger {
  const base = prefixedLogger("hearthd", basicLogger());
  if (args.verbose) return filteredLogger("debug", base);
  return filteredLogger(args.quiet ? "warn" : "info", base);
}
