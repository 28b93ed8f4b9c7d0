import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Scenario } from "../types.js";
import { registerEstimateBudget } from "./estimateBudget.js";
import { registerCompareScenarios } from "./compareScenarios.js";

export function registerBudgetTools(server: McpServer, defaultScenario: Scenario): void {
  registerEstimateBudget(server, defaultScenario);
  registerCompareScenarios(server);
}
