import type { Logger } from '../logger';
import type { DerivedSalaryRecord, EmployeeRecord } from '../types';

/** Rounds to cents, ties to even (3750.125 -> 3750.12, 0.375 -> 0.38). */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let cents: number;
  if (diff > 0.5) cents = floor + 1;
  else if (diff < 0.5) cents = floor;
  else cents = floor % 2 === 0 ? floor : floor + 1;
  return cents / 100;
}

export function deriveSalary(record: EmployeeRecord): DerivedSalaryRecord {
  const bonus = round2(record.basicSalary * (record.bonusPercentage / 100));
  const tax = round2(record.basicSalary * (record.taxPercentage / 100));
  const netSalary = round2(record.basicSalary + bonus - tax);
  return Object.freeze({ ...record, bonus, tax, netSalary });
}

/**
 * Adds bonus, tax and net salary to every record. Out-of-range values are not
 * rejected. Returns null only when there is no record set at all.
 */
export function deriveSalaryComponents(
  records: readonly EmployeeRecord[] | null | undefined,
  logger: Logger,
): DerivedSalaryRecord[] | null {
  if (!records) {
    logger.error('No employee data available. Please fetch data first.');
    return null;
  }
  const derived = records.map(deriveSalary);
  logger.info({ count: derived.length }, 'Salary components calculated successfully');
  return derived;
}
