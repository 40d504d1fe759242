export type EmployeeRecord = {
  employeeId: number;
  name: string;
  basicSalary: number;
  bonusPercentage: number; // 0-100 expected, not enforced
  taxPercentage: number;
};

export type DerivedSalaryRecord = Readonly<EmployeeRecord & {
  bonus: number;
  tax: number;
  netSalary: number;
}>;

export type NewEmployeeInput = {
  name: string;
  basicSalary: number;
  bonusPercentage: number;
  taxPercentage: number;
};

export type SalarySummary = {
  count: number;
  totalBasicSalary: number;
  totalBonus: number;
  totalTax: number;
  totalNetSalary: number;
  averageNetSalary: number | null; // null when there are no records
};

export type Clock = () => Date;

/** Sink for the human-readable console output (summary table, progress). */
export type LineWriter = (line: string) => void;
