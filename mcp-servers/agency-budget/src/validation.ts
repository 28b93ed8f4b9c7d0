import { FALLBACK_SCENARIO, SCENARIOS } from "./constants.js";
import type { Scenario, ScenarioResolution } from "./types.js";

export function isScenario(value: string): value is Scenario {
  return (SCENARIOS as readonly string[]).includes(value);
}

/**
 * Map a requested identifier onto a known scenario.
 *
 * Unknown identifiers are NOT rejected: they resolve to the comprehensive
 * profile, matching the behaviour existing consumers rely on. `fallback`
 * tells the caller this happened so it can warn.
 */
export function resolveScenario(requested: string): ScenarioResolution {
  if (isScenario(requested)) {
    return { scenario: requested, fallback: false };
  }
  return { scenario: FALLBACK_SCENARIO, fallback: true };
}

export function scenarioTitle(scenario: Scenario): string {
  return scenario.charAt(0).toUpperCase() + scenario.slice(1);
}

export function validateCurrency(amount: number): boolean {
  return Number.isFinite(amount) && amount >= 0;
}

export function validateHeadcount(count: number): boolean {
  return Number.isInteger(count) && count >= 0;
}
