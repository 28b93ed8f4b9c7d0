import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({ serverName: "agency-budget", defaultScenario: "moderate" });
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ AGENCY_BUDGET_SERVER_NAME: "", AGENCY_BUDGET_DEFAULT_SCENARIO: "" })).toEqual({
      serverName: "agency-budget",
      defaultScenario: "moderate",
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      AGENCY_BUDGET_SERVER_NAME: "budget-staging",
      AGENCY_BUDGET_DEFAULT_SCENARIO: "minimal",
    });
    expect(config).toEqual({ serverName: "budget-staging", defaultScenario: "minimal" });
  });

  it("rejects an unknown default scenario", () => {
    expect(() => loadConfig({ AGENCY_BUDGET_DEFAULT_SCENARIO: "bogus" })).toThrow(
      /^Invalid configuration: AGENCY_BUDGET_DEFAULT_SCENARIO: /,
    );
  });

  it("rejects a whitespace-only server name", () => {
    expect(() => loadConfig({ AGENCY_BUDGET_SERVER_NAME: "   " })).toThrow(/AGENCY_BUDGET_SERVER_NAME/);
  });
});
