#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import type { BudgetServerConfig } from "./config.js";
import { createBudgetServer } from "./server.js";

function readConfig(): BudgetServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`[agency-budget] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = readConfig();
const server = createBudgetServer(config);

console.error(`[agency-budget] Starting ${config.serverName} (default scenario: ${config.defaultScenario})`);

const transport = new StdioServerTransport();
await server.connect(transport);
