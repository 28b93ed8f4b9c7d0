/**
 * Raised when a per-employee figure is requested for a staffing profile with
 * no staff.
 */
export class InvalidDivisionError extends Error {
  constructor(
    readonly numerator: number,
    readonly divisor: number,
  ) {
    super(`Cannot divide ${numerator} across a staff count of ${divisor}`);
    this.name = "InvalidDivisionError";
  }
}
