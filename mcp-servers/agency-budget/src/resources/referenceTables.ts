import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  BENEFITS_OVERHEAD_MULTIPLIER,
  JOB_CATEGORIES,
  JOB_CATEGORY_TITLES,
  SALARY_TABLE,
  SCALE_FACTORS,
} from "../constants.js";

export function registerReferenceTables(server: McpServer): void {
  server.registerResource(
    "salary_table",
    "budget://salary-table",
    {
      title: "Salary Table",
      description: "Annual base salary per job category and the benefits overhead multiplier.",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [{
        uri: uri.href,
        text: JSON.stringify({
          benefits_overhead_multiplier: BENEFITS_OVERHEAD_MULTIPLIER,
          categories: JOB_CATEGORIES.map((key) => ({
            key,
            title: JOB_CATEGORY_TITLES[key],
            avg_salary: SALARY_TABLE[key],
            loaded_salary: SALARY_TABLE[key] * BENEFITS_OVERHEAD_MULTIPLIER,
          })),
        }),
      }],
    }),
  );

  server.registerResource(
    "scale_factors",
    "budget://scale-factors",
    {
      title: "Scale Factors",
      description: "Compute, facility and contract multipliers applied to operational costs per scenario.",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [{ uri: uri.href, text: JSON.stringify(SCALE_FACTORS) }],
    }),
  );
}
