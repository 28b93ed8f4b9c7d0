export {
  ScenarioCostCalculator,
  buildOperational,
  buildStaffing,
  compareScenarios,
  divideAcrossStaff,
  loadedCost,
  sumHeadcount,
  summarizeAllScenarios,
} from "./calculator.js";
export {
  BENEFITS_OVERHEAD_MULTIPLIER,
  DEFAULT_SCENARIO,
  FALLBACK_SCENARIO,
  JOB_CATEGORIES,
  JOB_CATEGORY_TITLES,
  OPERATIONAL_ITEMS,
  SALARY_TABLE,
  SCALE_FACTORS,
  SCENARIOS,
  STAFFING_PLANS,
} from "./constants.js";
export { InvalidDivisionError } from "./errors.js";
export { isScenario, resolveScenario, scenarioTitle, validateCurrency, validateHeadcount } from "./validation.js";
export { loadConfig } from "./config.js";
export type { BudgetServerConfig } from "./config.js";
export { createBudgetServer } from "./server.js";
export type {
  CostSummary,
  JobCategory,
  OperationalBasis,
  OperationalBreakdownRow,
  OperationalItem,
  OperationalLine,
  SalaryTable,
  ScaleFactors,
  ScaleKind,
  Scenario,
  ScenarioComparisonRow,
  ScenarioResolution,
  StaffingBreakdownRow,
  StaffingLine,
  StaffingPlanEntry,
} from "./types.js";
