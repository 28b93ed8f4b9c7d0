import type {
  JobCategory,
  OperationalItem,
  SalaryTable,
  ScaleFactors,
  Scenario,
  StaffingPlanEntry,
} from "./types.js";

function freezeRows<T extends object>(rows: T[]): readonly T[] {
  for (const row of rows) Object.freeze(row);
  return Object.freeze(rows);
}

function freezeItems(items: OperationalItem[]): readonly OperationalItem[] {
  for (const item of items) Object.freeze(item.basis);
  return freezeRows(items);
}

export const SCENARIOS: readonly Scenario[] = Object.freeze(["minimal", "moderate", "comprehensive"]);

export const DEFAULT_SCENARIO: Scenario = "moderate";

// Unknown identifiers resolve here
export const FALLBACK_SCENARIO: Scenario = "comprehensive";

// 30% benefits overhead on top of base salary
export const BENEFITS_OVERHEAD_MULTIPLIER = 1.3;

// Annual base salaries, NY state government compensation bands
export const SALARY_TABLE: SalaryTable = Object.freeze({
  executive_leadership: 175000,
  senior_technical: 145000,
  technical_staff: 110000,
  policy_legal: 115000,
  compliance_enforcement: 95000,
  operations_admin: 70000,
  junior_technical: 85000,
});

export const JOB_CATEGORIES: readonly JobCategory[] = Object.freeze([
  "executive_leadership",
  "senior_technical",
  "technical_staff",
  "junior_technical",
  "policy_legal",
  "compliance_enforcement",
  "operations_admin",
]);

export const JOB_CATEGORY_TITLES: Readonly<Record<JobCategory, string>> = Object.freeze({
  executive_leadership: "Executive Leadership",
  senior_technical: "Senior Technical Staff",
  technical_staff: "Technical Staff",
  junior_technical: "Junior Technical Staff",
  policy_legal: "Policy & Legal",
  compliance_enforcement: "Compliance & Enforcement",
  operations_admin: "Operations & Administration",
});

export const STAFFING_PLANS: Readonly<Record<Scenario, readonly StaffingPlanEntry[]>> = Object.freeze({
  // Small focused team: basic model evaluation and oversight
  minimal: freezeRows<StaffingPlanEntry>([
    { category: "executive_leadership", count: 3, description: "Commissioner, Deputy Commissioner, Chief of Staff" },
    { category: "senior_technical", count: 8, description: "Senior AI Safety Researchers, Principal ML Engineers" },
    { category: "technical_staff", count: 20, description: "AI Safety Researchers, ML Engineers, Model Evaluators" },
    { category: "policy_legal", count: 8, description: "Policy Analysts, Legal Counsel, Regulatory Affairs" },
    { category: "compliance_enforcement", count: 6, description: "Compliance Officers, Enforcement Investigators" },
    { category: "operations_admin", count: 5, description: "Administrative Support, HR, Finance, IT" },
  ]),

  // Medium agency: evaluation, compliance and enforcement
  moderate: freezeRows<StaffingPlanEntry>([
    { category: "executive_leadership", count: 5, description: "Commissioner, 2 Deputy Commissioners, Chief of Staff, Strategic Advisor" },
    { category: "senior_technical", count: 20, description: "Senior AI Safety Researchers, Principal Engineers, Technical Directors" },
    { category: "technical_staff", count: 60, description: "AI Safety Researchers, ML Engineers, Model Evaluators, Security Analysts" },
    { category: "junior_technical", count: 20, description: "Junior Researchers, Technical Analysts, Research Associates" },
    { category: "policy_legal", count: 20, description: "Policy Analysts, Legal Counsel, Regulatory Affairs, Interagency Liaisons" },
    { category: "compliance_enforcement", count: 15, description: "Compliance Officers, Enforcement Investigators, Audit Coordinators" },
    { category: "operations_admin", count: 10, description: "Administrative Support, HR, Finance, IT, Communications" },
  ]),

  // Full-service agency: proactive monitoring, research, international coordination
  comprehensive: freezeRows<StaffingPlanEntry>([
    { category: "executive_leadership", count: 8, description: "Commissioner, 3 Deputy Commissioners, Chief of Staff, Strategic Advisors, Division Directors" },
    { category: "senior_technical", count: 40, description: "Senior Researchers, Principal Engineers, Technical Directors, Research Leads" },
    { category: "technical_staff", count: 140, description: "AI Safety Researchers, ML Engineers, Evaluators, Security Analysts, Red Team" },
    { category: "junior_technical", count: 40, description: "Junior Researchers, Technical Analysts, Research Associates" },
    { category: "policy_legal", count: 35, description: "Policy Analysts, Legal Counsel, Regulatory Affairs, International Coordinators" },
    { category: "compliance_enforcement", count: 25, description: "Compliance Officers, Enforcement Investigators, Audit Team, Field Inspectors" },
    { category: "operations_admin", count: 20, description: "Administrative Support, HR, Finance, IT, Communications, Facilities" },
  ]),
});

export const SCALE_FACTORS: Readonly<Record<Scenario, ScaleFactors>> = Object.freeze({
  minimal: Object.freeze({ compute: 1.0, facility: 0.8, contract: 0.7 }),
  moderate: Object.freeze({ compute: 2.0, facility: 1.0, contract: 1.0 }),
  comprehensive: Object.freeze({ compute: 4.0, facility: 1.2, contract: 1.5 }),
});

export const OPERATIONAL_ITEMS: readonly OperationalItem[] = freezeItems([
  {
    category: "Compute Infrastructure & Cloud Services",
    description: "GPU clusters for model evaluation, cloud services, data storage",
    basis: { kind: "flat", amount: 8_000_000, scale: "compute" },
  },
  {
    category: "Facilities & Real Estate",
    description: "Office space, security, utilities (avg $12k/employee annually in NYC)",
    basis: { kind: "per_employee", amount: 12_000, scale: "facility" },
  },
  {
    category: "Technology & Software",
    description: "Software licenses, development tools, security tools, collaboration platforms",
    basis: { kind: "per_employee", amount: 8_000 },
  },
  {
    category: "External Research & Contracts",
    description: "University partnerships, consulting, third-party audits, expert reviews",
    basis: { kind: "flat", amount: 5_000_000, scale: "contract" },
  },
  {
    category: "Training & Professional Development",
    description: "Technical training, conferences, certifications, continuing education",
    basis: { kind: "per_employee", amount: 5_000 },
  },
  {
    category: "Travel & Outreach",
    description: "Industry engagement, international coordination, conferences, site visits",
    basis: { kind: "flat", amount: 1_000_000, scale: "contract" },
  },
  {
    category: "Legal & Compliance",
    description: "External legal counsel, compliance tools, regulatory filings",
    basis: { kind: "flat", amount: 800_000, scale: "contract" },
  },
  {
    category: "Communications & Public Affairs",
    description: "Public education, stakeholder engagement, reporting, publications",
    basis: { kind: "flat", amount: 500_000, scale: "facility" },
  },
  {
    category: "Emergency Response & Incident Management",
    description: "Rapid response capabilities, incident investigation, crisis management",
    basis: { kind: "flat", amount: 1_500_000, scale: "compute" },
  },
  {
    category: "Administrative Overhead",
    description: "General supplies, equipment, miscellaneous operational expenses",
    basis: { kind: "flat", amount: 500_000, scale: "facility" },
  },
]);
