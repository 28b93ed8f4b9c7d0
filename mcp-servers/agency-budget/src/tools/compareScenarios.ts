import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { compareScenarios } from "../calculator.js";

export function registerCompareScenarios(server: McpServer): void {
  server.registerTool(
    "compare_scenarios",
    {
      title: "Compare Budget Scenarios",
      description: "Total staff, annual budget, personnel, operational and per-employee cost for minimal, moderate and comprehensive.",
      inputSchema: {},
    },
    async () => {
      try {
        return { content: [{ type: "text", text: JSON.stringify(compareScenarios()) }] };
      } catch (err) {
        return {
          content: [{ type: "text", text: `Scenario comparison failed: ${err instanceof Error ? err.message : String(err)}` }],
          isError: true,
        };
      }
    },
  );
}
