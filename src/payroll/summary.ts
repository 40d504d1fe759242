import type { DerivedSalaryRecord, SalarySummary } from '../types';
import { round2 } from './calculate';

const RULE_WIDTH = 80;

export function summarizeSalaries(records: readonly DerivedSalaryRecord[]): SalarySummary {
  const total = (pick: (r: DerivedSalaryRecord) => number) => round2(records.reduce((acc, r) => acc + pick(r), 0));
  const totalNetSalary = total((r) => r.netSalary);
  return {
    count: records.length,
    totalBasicSalary: total((r) => r.basicSalary),
    totalBonus: total((r) => r.bonus),
    totalTax: total((r) => r.tax),
    totalNetSalary,
    averageNetSalary: records.length > 0 ? round2(totalNetSalary / records.length) : null,
  };
}

export function formatMoney(amount: number | null): string {
  if (amount === null) return 'N/A';
  return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

type TableColumn = {
  header: string;
  align: 'left' | 'right';
  value: (r: DerivedSalaryRecord) => string;
};

const columns: TableColumn[] = [
  { header: 'employee_id', align: 'right', value: (r) => String(r.employeeId) },
  { header: 'name', align: 'left', value: (r) => r.name },
  { header: 'basic_salary', align: 'right', value: (r) => r.basicSalary.toFixed(2) },
  { header: 'bonus_percentage', align: 'right', value: (r) => r.bonusPercentage.toFixed(2) },
  { header: 'tax_percentage', align: 'right', value: (r) => r.taxPercentage.toFixed(2) },
  { header: 'bonus', align: 'right', value: (r) => r.bonus.toFixed(2) },
  { header: 'tax', align: 'right', value: (r) => r.tax.toFixed(2) },
  { header: 'net_salary', align: 'right', value: (r) => r.netSalary.toFixed(2) },
];

/** Fixed-width table: every column is as wide as its longest cell, separated by two spaces. */
export function formatSalaryTable(records: readonly DerivedSalaryRecord[]): string[] {
  const cells = records.map((r) => columns.map((c) => c.value(r)));
  const widths = columns.map((c, i) => Math.max(c.header.length, ...cells.map((row) => row[i].length)));
  const line = (row: string[]) =>
    row
      .map((cell, i) => (columns[i].align === 'left' ? cell.padEnd(widths[i]) : cell.padStart(widths[i])))
      .join('  ')
      .trimEnd();

  return [line(columns.map((c) => c.header)), ...cells.map(line)];
}

export function formatSalarySummary(records: readonly DerivedSalaryRecord[]): string[] {
  const rule = '='.repeat(RULE_WIDTH);
  const s = summarizeSalaries(records);
  return [
    '',
    rule,
    'EMPLOYEE SALARY SUMMARY',
    rule,
    ...formatSalaryTable(records),
    rule,
    '',
    'SALARY STATISTICS:',
    `Total Employees: ${s.count}`,
    `Total Basic Salary: ${formatMoney(s.totalBasicSalary)}`,
    `Total Bonus: ${formatMoney(s.totalBonus)}`,
    `Total Tax: ${formatMoney(s.totalTax)}`,
    `Total Net Salary: ${formatMoney(s.totalNetSalary)}`,
    `Average Net Salary: ${formatMoney(s.averageNetSalary)}`,
    rule,
  ];
}
