import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ScenarioCostCalculator, compareScenarios } from "../calculator.js";
import { SCENARIOS } from "../constants.js";
import { scenarioTitle } from "../validation.js";

export function registerScenarioSummary(server: McpServer): void {
  // Side-by-side totals for every scenario
  server.registerResource(
    "scenario_comparison",
    "budget://scenarios",
    {
      title: "Scenario Comparison",
      description: "Staff, budget, personnel, operational and per-employee totals for every scenario.",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [{ uri: uri.href, text: JSON.stringify(compareScenarios()) }],
    }),
  );

  // Full itemized summary for one scenario
  server.registerResource(
    "scenario_summary",
    new ResourceTemplate("budget://scenarios/{scenario}", {
      list: async () => ({
        resources: SCENARIOS.map((s) => ({
          uri: `budget://scenarios/${s}`,
          name: `${scenarioTitle(s)} scenario`,
          mimeType: "application/json",
        })),
      }),
    }),
    {
      title: "Scenario Budget Summary",
      description: "Itemized staffing and operational costs for a scenario. Unknown scenarios are treated as comprehensive.",
      mimeType: "application/json",
    },
    async (uri, params) => {
      const raw = params.scenario;
      const requested = typeof raw === "string" ? raw : raw?.[0] ?? "";
      const calc = new ScenarioCostCalculator(requested);
      if (calc.fallback) {
        console.error(`[agency-budget] Unknown scenario "${requested}" — using ${calc.scenario}`);
      }
      return { contents: [{ uri: uri.href, text: JSON.stringify(calc.summary()) }] };
    },
  );
}
