import { writeToString } from 'fast-csv';
import { promises as fs } from 'fs';
import path from 'path';
import { describeError, ExportError } from '../errors';
import type { Logger } from '../logger';
import type { Clock, DerivedSalaryRecord } from '../types';
import { formatGeneratedAt } from './timestamp';

export const SALARY_SLIP_HEADERS = [
  'Employee ID',
  'Name',
  'Basic Salary',
  'Bonus Percentage',
  'Bonus Amount',
  'Tax Percentage',
  'Tax Amount',
  'Net Salary',
  'Generated Date',
] as const;

export const REPORT_HEADERS = [
  'employee_id',
  'name',
  'basic_salary',
  'bonus_percentage',
  'tax_percentage',
  'bonus',
  'tax',
  'net_salary',
  'report_generated',
] as const;

export type ExportOptions = {
  logger: Logger;
  now?: Clock;
};

const amount = (n: number) => n.toFixed(2);
const percent = (n: number) => `${n.toFixed(2)}%`;

export function salarySlipFileName(employeeId: number, extension = 'csv'): string {
  return `salary_slip_${employeeId}.${extension}`;
}

export function salarySlipRow(r: DerivedSalaryRecord, generatedAt: string): string[] {
  return [
    String(r.employeeId),
    r.name,
    amount(r.basicSalary),
    percent(r.bonusPercentage),
    amount(r.bonus),
    percent(r.taxPercentage),
    amount(r.tax),
    amount(r.netSalary),
    generatedAt,
  ];
}

export function reportRow(r: DerivedSalaryRecord, generatedAt: string): string[] {
  return [
    String(r.employeeId),
    r.name,
    amount(r.basicSalary),
    amount(r.bonusPercentage),
    amount(r.taxPercentage),
    amount(r.bonus),
    amount(r.tax),
    amount(r.netSalary),
    generatedAt,
  ];
}

export function toCsv(rows: string[][]): Promise<string> {
  return writeToString(rows, { includeEndRowDelimiter: true });
}

export async function ensureDirectory(dir: string, logger: Logger): Promise<void> {
  const existed = await fs
    .stat(dir)
    .then((s) => s.isDirectory())
    .catch(() => false);
  if (!existed) {
    await fs.mkdir(dir, { recursive: true });
    logger.info({ dir }, 'Created directory');
  }
}

/**
 * Writes salary_slip_<id>.csv per record. Stops at the first failure; slips
 * already written stay on disk.
 */
export async function generateSalarySlips(
  records: readonly DerivedSalaryRecord[] | null,
  outputDir: string,
  { logger, now = () => new Date() }: ExportOptions,
): Promise<string[] | null> {
  if (!records) {
    logger.error('No employee data available for salary slip generation');
    return null;
  }

  const written: string[] = [];
  try {
    await ensureDirectory(outputDir, logger);
    for (const r of records) {
      const file = path.join(outputDir, salarySlipFileName(r.employeeId));
      const csv = await toCsv([[...SALARY_SLIP_HEADERS], salarySlipRow(r, formatGeneratedAt(now()))]);
      try {
        await fs.writeFile(file, csv, 'utf8');
      } catch (err) {
        throw new ExportError(`Could not write ${file}`, { cause: err });
      }
      written.push(file);
      logger.info({ file }, 'Generated salary slip');
    }
  } catch (err) {
    logger.error({ written: written.length }, `Error generating salary slips: ${describeError(err)}`);
    return null;
  }

  logger.info({ outputDir, count: written.length }, 'All salary slips generated successfully');
  return written;
}

export async function exportCompleteReport(
  records: readonly DerivedSalaryRecord[] | null,
  file: string,
  { logger, now = () => new Date() }: ExportOptions,
): Promise<boolean> {
  if (!records) {
    logger.error('No employee data available for export');
    return false;
  }

  try {
    const generatedAt = formatGeneratedAt(now());
    const csv = await toCsv([[...REPORT_HEADERS], ...records.map((r) => reportRow(r, generatedAt))]);
    const dir = path.dirname(file);
    if (dir !== '.') await ensureDirectory(dir, logger);
    await fs.writeFile(file, csv, 'utf8');
  } catch (err) {
    logger.error(`Error exporting complete report: ${describeError(err)}`);
    return false;
  }

  logger.info({ file, rows: records.length }, 'Complete salary report exported');
  return true;
}
