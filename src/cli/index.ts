#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { serveCommand } from "./commands/serve";
import { runCommand } from "./commands/run";
import { toolsListCommand } from "./commands/toolsList";
import { API_VERSION } from "../server/http";

export function createCli(): Command {
  const program = new Command();

  program
    .name("toolcast")
    .description("toolcast CLI: run tool-call batches and serve them over HTTP/SSE")
    .version(API_VERSION);

  program.addCommand(serveCommand());
  program.addCommand(runCommand());
  program.addCommand(toolsListCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
