import { z } from "zod";
import { DEFAULT_SCENARIO } from "./constants.js";
import type { Scenario } from "./types.js";

export interface BudgetServerConfig {
  serverName: string;
  defaultScenario: Scenario;
}

const scenarioSchema = z.enum(["minimal", "moderate", "comprehensive"]);

const envSchema = z.object({
  AGENCY_BUDGET_SERVER_NAME: z.string().trim().min(1).default("agency-budget"),
  AGENCY_BUDGET_DEFAULT_SCENARIO: scenarioSchema.default(DEFAULT_SCENARIO),
});

/**
 * Read server configuration from the environment. Empty strings count as
 * unset. Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BudgetServerConfig {
  const parsed = envSchema.safeParse({
    AGENCY_BUDGET_SERVER_NAME: env.AGENCY_BUDGET_SERVER_NAME || undefined,
    AGENCY_BUDGET_DEFAULT_SCENARIO: env.AGENCY_BUDGET_DEFAULT_SCENARIO || undefined,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  return {
    serverName: parsed.data.AGENCY_BUDGET_SERVER_NAME,
    defaultScenario: parsed.data.AGENCY_BUDGET_DEFAULT_SCENARIO,
  };
}
