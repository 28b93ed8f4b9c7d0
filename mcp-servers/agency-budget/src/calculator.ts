import {
  BENEFITS_OVERHEAD_MULTIPLIER,
  DEFAULT_SCENARIO,
  JOB_CATEGORY_TITLES,
  OPERATIONAL_ITEMS,
  SALARY_TABLE,
  SCALE_FACTORS,
  SCENARIOS,
  STAFFING_PLANS,
} from "./constants.js";
import { InvalidDivisionError } from "./errors.js";
import { resolveScenario, scenarioTitle } from "./validation.js";
import type {
  CostSummary,
  OperationalBasis,
  OperationalLine,
  ScaleFactors,
  Scenario,
  ScenarioComparisonRow,
  StaffingLine,
} from "./types.js";

// ---------------------------------------------------------------------------
// Line builders
// ---------------------------------------------------------------------------

/** Personnel cost of a line including benefits overhead. */
export function loadedCost(line: StaffingLine): number {
  return line.count * line.avg_salary * BENEFITS_OVERHEAD_MULTIPLIER;
}

export function buildStaffing(scenario: Scenario): readonly StaffingLine[] {
  return Object.freeze(STAFFING_PLANS[scenario].map((entry): StaffingLine => Object.freeze({
    category: entry.category,
    title: JOB_CATEGORY_TITLES[entry.category],
    count: entry.count,
    avg_salary: SALARY_TABLE[entry.category],
    description: entry.description,
  })));
}

function priceOperational(basis: OperationalBasis, totalStaff: number, scales: ScaleFactors): number {
  if (basis.kind === "flat") {
    return basis.amount * scales[basis.scale];
  }
  const base = totalStaff * basis.amount;
  return basis.scale ? base * scales[basis.scale] : base;
}

/**
 * Operational lines for a scenario. Per-employee items depend on the
 * scenario's headcount, so staffing must be built first. Lines are frozen.
 */
export function buildOperational(scenario: Scenario, totalStaff: number): readonly OperationalLine[] {
  const scales = SCALE_FACTORS[scenario];
  return Object.freeze(OPERATIONAL_ITEMS.map((item): OperationalLine => Object.freeze({
    category: item.category,
    annual_cost: priceOperational(item.basis, totalStaff, scales),
    description: item.description,
  })));
}

export function sumHeadcount(staffing: readonly StaffingLine[]): number {
  return staffing.reduce((s, line) => s + line.count, 0);
}

export function divideAcrossStaff(total: number, staffCount: number): number {
  if (staffCount === 0) {
    throw new InvalidDivisionError(total, staffCount);
  }
  return total / staffCount;
}

function percentOf(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

// ---------------------------------------------------------------------------
// ScenarioCostCalculator
// ---------------------------------------------------------------------------

export class ScenarioCostCalculator {
  /** Identifier as given by the caller, before fallback. */
  readonly requested: string;
  readonly scenario: Scenario;
  /** True when `requested` was unknown and the fallback profile was used. */
  readonly fallback: boolean;

  readonly staffing: readonly StaffingLine[];
  readonly operational: readonly OperationalLine[];

  constructor(requested: string = DEFAULT_SCENARIO) {
    const resolved = resolveScenario(requested);
    this.requested = requested;
    this.scenario = resolved.scenario;
    this.fallback = resolved.fallback;

    this.staffing = buildStaffing(this.scenario);
    this.operational = buildOperational(this.scenario, sumHeadcount(this.staffing));
  }

  totalPersonnelCost(): number {
    return this.staffing.reduce((s, line) => s + loadedCost(line), 0);
  }

  totalOperationalCost(): number {
    return this.operational.reduce((s, line) => s + line.annual_cost, 0);
  }

  totalAnnualCost(): number {
    return this.totalPersonnelCost() + this.totalOperationalCost();
  }

  totalStaffCount(): number {
    return sumHeadcount(this.staffing);
  }

  /** Throws InvalidDivisionError when the headcount is zero. */
  costPerEmployee(): number {
    return divideAcrossStaff(this.totalAnnualCost(), this.totalStaffCount());
  }

  /** Throws InvalidDivisionError when the headcount is zero, like costPerEmployee(). */
  summary(): CostSummary {
    const personnel = this.totalPersonnelCost();
    const operational = this.totalOperationalCost();
    const total = personnel + operational;

    return {
      scenario: scenarioTitle(this.scenario),
      total_staff: this.totalStaffCount(),
      total_annual_budget: total,
      personnel_costs: personnel,
      operational_costs: operational,
      cost_per_employee: this.costPerEmployee(),
      staffing_breakdown: this.staffing.map((line) => {
        const cost = loadedCost(line);
        return {
          category: line.title,
          count: line.count,
          avg_salary: line.avg_salary,
          total_cost: cost,
          description: line.description,
          percent_of_total: percentOf(cost, total),
        };
      }),
      operational_breakdown: this.operational.map((line) => ({
        category: line.category,
        annual_cost: line.annual_cost,
        description: line.description,
        percent_of_total: percentOf(line.annual_cost, total),
      })),
    };
  }
}

// ---------------------------------------------------------------------------
// Cross-scenario queries
// ---------------------------------------------------------------------------

export function summarizeAllScenarios(): Record<Scenario, CostSummary> {
  return {
    minimal: new ScenarioCostCalculator("minimal").summary(),
    moderate: new ScenarioCostCalculator("moderate").summary(),
    comprehensive: new ScenarioCostCalculator("comprehensive").summary(),
  };
}

export function compareScenarios(): ScenarioComparisonRow[] {
  return SCENARIOS.map((scenario) => {
    const calc = new ScenarioCostCalculator(scenario);
    return {
      scenario,
      total_staff: calc.totalStaffCount(),
      total_annual_budget: calc.totalAnnualCost(),
      personnel_costs: calc.totalPersonnelCost(),
      operational_costs: calc.totalOperationalCost(),
      cost_per_employee: calc.costPerEmployee(),
    };
  });
}
