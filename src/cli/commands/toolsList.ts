/**
 * toolcast tools:list
 */

import { Command } from "commander";
import { printTable, LineWriter } from "../utils/printTable";
import { ToolRegistry } from "../../core/tool-engine/registry";
import { loadConfig } from "../../core/config";
import { createSilentLogger } from "../../core/logger";
import { createRuntime } from "../../runtime";

export function listTools(registry: ToolRegistry, write?: LineWriter): void {
  const rows = registry
    .list()
    .map((tool) => [tool.name, String(tool.priority), `${tool.timeoutMs / 1000}s`, tool.description ?? ""]);
  printTable(["NAME", "PRIORITY", "TIMEOUT", "DESCRIPTION"], rows, write);
}

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd
    .description("List registered tools")
    .option("--config <path>", "path to toolcast.config.json")
    .action((opts: { config?: string }) => {
      const { registry } = createRuntime(loadConfig({ file: opts.config }), { logger: createSilentLogger() });
      listTools(registry);
    });
  return cmd;
}
