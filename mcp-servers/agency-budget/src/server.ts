import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { BudgetServerConfig } from "./config.js";
import { registerBudgetResources } from "./resources/index.js";
import { registerBudgetTools } from "./tools/index.js";

const BUDGET_INSTRUCTIONS = `AGENCY BUDGET MCP — COST MODEL

You have access to an annual cost model for a proposed frontier AI safety
regulatory agency, under three scenarios: minimal (~50 staff), moderate
(~150 staff) and comprehensive (~300 staff).

RESOURCES (read anytime):
- budget://scenarios — side-by-side totals for all scenarios
- budget://scenarios/{scenario} — itemized summary for one scenario
- budget://salary-table — base salary per job category and benefits multiplier
- budget://scale-factors — compute/facility/contract multipliers per scenario

TOOLS:
- estimate_budget — itemized budget for a scenario
- compare_scenarios — totals for every scenario

NOTES:
- Personnel cost = headcount × base salary × 1.30 (30% benefits overhead).
- Unknown scenario names are treated as comprehensive. Say so if you pass one.
- Figures are hypothetical planning estimates, in US dollars per year.`;

export function createBudgetServer(config: BudgetServerConfig): McpServer {
  const server = new McpServer(
    { name: config.serverName, version: "1.0.0" },
    {
      capabilities: { logging: {} },
      instructions: BUDGET_INSTRUCTIONS,
    },
  );

  registerBudgetResources(server);
  registerBudgetTools(server, config.defaultScenario);

  return server;
}
