import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerScenarioSummary } from "./scenarioSummary.js";
import { registerReferenceTables } from "./referenceTables.js";

export function registerBudgetResources(server: McpServer): void {
  registerScenarioSummary(server);
  registerReferenceTables(server);
}
