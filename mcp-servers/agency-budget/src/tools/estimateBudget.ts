import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ScenarioCostCalculator } from "../calculator.js";
import type { Scenario } from "../types.js";

function formatUsd(amount: number): string {
  return `$${Math.round(amount).toLocaleString("en-US")}`;
}

export function registerEstimateBudget(server: McpServer, defaultScenario: Scenario): void {
  server.registerTool(
    "estimate_budget",
    {
      title: "Estimate Agency Budget",
      description:
        "Itemized annual budget for a scenario: staffing lines with loaded cost, operational lines, totals and cost per employee. " +
        "Unknown scenario names are treated as comprehensive.",
      inputSchema: {
        scenario: z.string().optional().describe("minimal | moderate | comprehensive (defaults to the server's configured scenario)"),
      },
    },
    async ({ scenario }) => {
      try {
        const calc = new ScenarioCostCalculator(scenario ?? defaultScenario);
        if (calc.fallback) {
          console.error(`[agency-budget] Unknown scenario "${calc.requested}" — using ${calc.scenario}`);
        }
        const summary = calc.summary();

        const headline =
          `${summary.scenario} scenario: ${formatUsd(summary.total_annual_budget)} per year, ` +
          `${summary.total_staff} staff, ${formatUsd(summary.cost_per_employee)} per employee.`;

        return {
          content: [
            { type: "text", text: headline },
            { type: "text", text: JSON.stringify(summary) },
          ],
        };
      } catch (err) {
        return {
          content: [{ type: "text", text: `Budget estimate failed: ${err instanceof Error ? err.message : String(err)}` }],
          isError: true,
        };
      }
    },
  );
}
