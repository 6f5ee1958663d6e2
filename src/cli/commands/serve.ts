/**
 * toolcast serve
 */

import { Command, InvalidArgumentError } from "commander";
import { serve } from "../../server-main";
import { toErrorMessage } from "../../core/errors";

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("Expected a port between 0 and 65535.");
  }
  return port;
}

export function serveCommand(): Command {
  const cmd = new Command("serve");
  cmd
    .description("Start the HTTP/SSE server")
    .option("-p, --port <port>", "port to listen on (overrides PORT)", parsePort)
    .option("--config <path>", "path to toolcast.config.json")
    .action(async (opts: { port?: number; config?: string }) => {
      try {
        await serve({ port: opts.port, configFile: opts.config });
      } catch (e) {
        console.error("Server failed to start:", toErrorMessage(e));
        process.exitCode = 1;
      }
    });
  return cmd;
}
