// --- Scenarios ---

export type Scenario = "minimal" | "moderate" | "comprehensive";

export interface ScaleFactors {
  readonly compute: number;
  readonly facility: number;
  readonly contract: number;
}

export type ScaleKind = keyof ScaleFactors;

// --- Staffing ---

export type JobCategory =
  | "executive_leadership"
  | "senior_technical"
  | "technical_staff"
  | "junior_technical"
  | "policy_legal"
  | "compliance_enforcement"
  | "operations_admin";

export type SalaryTable = Readonly<Record<JobCategory, number>>;

export interface StaffingPlanEntry {
  readonly category: JobCategory;
  readonly count: number;
  readonly description: string;
}

export interface StaffingLine {
  readonly category: JobCategory;
  readonly title: string;
  readonly count: number;
  readonly avg_salary: number;
  readonly description: string;
}

// --- Operational costs ---

/**
 * How an operational item is priced. `flat` amounts are multiplied by the
 * scenario scale; `per_employee` amounts by headcount, then the scale if one
 * is named.
 */
export type OperationalBasis =
  | { readonly kind: "flat"; readonly amount: number; readonly scale: ScaleKind }
  | { readonly kind: "per_employee"; readonly amount: number; readonly scale?: ScaleKind };

export interface OperationalItem {
  readonly category: string;
  readonly description: string;
  readonly basis: OperationalBasis;
}

export interface OperationalLine {
  readonly category: string;
  readonly annual_cost: number;
  readonly description: string;
}

// --- Summaries ---

export interface StaffingBreakdownRow {
  category: string;
  count: number;
  avg_salary: number;
  total_cost: number;
  description: string;
  percent_of_total: number;
}

export interface OperationalBreakdownRow {
  category: string;
  annual_cost: number;
  description: string;
  percent_of_total: number;
}

export interface CostSummary {
  scenario: string;
  total_staff: number;
  total_annual_budget: number;
  personnel_costs: number;
  operational_costs: number;
  cost_per_employee: number;
  staffing_breakdown: StaffingBreakdownRow[];
  operational_breakdown: OperationalBreakdownRow[];
}

export interface ScenarioComparisonRow {
  scenario: Scenario;
  total_staff: number;
  total_annual_budget: number;
  personnel_costs: number;
  operational_costs: number;
  cost_per_employee: number;
}

export interface ScenarioResolution {
  scenario: Scenario;
  fallback: boolean;
}
