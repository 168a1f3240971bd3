#!/usr/bin/env node
import { createNodeServer } from "@hearthd/engine";
import { type CliArgs, CliArgsError, HELP_TEXT, parseArgs } from "./args.js";
import { buildConfig, buildLogger } from "./config.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliArgsError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (args.version) {
    console.log(VERSION);
    process.exit(0);
  }

  const config = buildConfig(args);
  const logger = buildLogger(args);
  const server = createNodeServer({ config, logger });

  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  hearthd serving ${config.root}\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
