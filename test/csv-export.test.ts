import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  exportCompleteReport,
  generateSalarySlips,
  salarySlipFileName,
  toCsv,
} from '../src/export/csvExport';
import { deriveSalary } from '../src/payroll/calculate';
import { fixedClock, makeEmployee, silentLogger } from './helpers/factories';

const generatedAt = new Date(2024, 0, 31, 9, 5, 7);

const records = [
  deriveSalary(makeEmployee({ employeeId: 7, name: 'Ava Thompson' })),
  deriveSalary(makeEmployee({ employeeId: 9, name: 'Patel, Noah', basicSalary: 60000, bonusPercentage: 12, taxPercentage: 18 })),
  deriveSalary(makeEmployee({ employeeId: 12, name: 'Mia Fernandes', basicSalary: 45000, bonusPercentage: 8, taxPercentage: 12 })),
];

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'salary-slips-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('toCsv()', () => {
  it('quotes fields containing the delimiter and ends with a newline', async () => {
    expect(await toCsv([['a', 'b, c'], ['1', '2']])).toBe('a,"b, c"\n1,2\n');
  });
});

describe('generateSalarySlips()', () => {
  it('writes one file per record named by employee id', async () => {
    const slipDir = path.join(dir, 'slips');
    const written = await generateSalarySlips(records, slipDir, { logger: silentLogger(), now: fixedClock(generatedAt) });

    expect(written).toEqual([
      path.join(slipDir, 'salary_slip_7.csv'),
      path.join(slipDir, 'salary_slip_9.csv'),
      path.join(slipDir, 'salary_slip_12.csv'),
    ]);
    expect((await fs.readdir(slipDir)).sort()).toEqual(['salary_slip_12.csv', 'salary_slip_7.csv', 'salary_slip_9.csv']);
  });

  it('writes the nine-column slip row', async () => {
    await generateSalarySlips(records, dir, { logger: silentLogger(), now: fixedClock(generatedAt) });

    expect(await fs.readFile(path.join(dir, 'salary_slip_7.csv'), 'utf8')).toBe(
      'Employee ID,Name,Basic Salary,Bonus Percentage,Bonus Amount,Tax Percentage,Tax Amount,Net Salary,Generated Date\n' +
        '7,Ava Thompson,50000.00,10.00%,5000.00,15.00%,7500.00,47500.00,2024-01-31 09:05:07\n',
    );
    const second = (await fs.readFile(path.join(dir, 'salary_slip_9.csv'), 'utf8')).split('\n')[1];
    expect(second).toBe('9,"Patel, Noah",60000.00,12.00%,7200.00,18.00%,10800.00,56400.00,2024-01-31 09:05:07');
  });

  it('overwrites an existing slip', async () => {
    await fs.writeFile(path.join(dir, salarySlipFileName(7)), 'stale', 'utf8');
    await generateSalarySlips([records[0]], dir, { logger: silentLogger(), now: fixedClock(generatedAt) });
    const content = await fs.readFile(path.join(dir, 'salary_slip_7.csv'), 'utf8');
    expect(content.startsWith('Employee ID,')).toBe(true);
  });

  it('keeps the slips written before a failure', async () => {
    // a directory in place of the second slip makes its write fail
    await fs.mkdir(path.join(dir, 'salary_slip_9.csv'));

    const written = await generateSalarySlips(records, dir, { logger: silentLogger(), now: fixedClock(generatedAt) });

    expect(written).toBeNull();
    expect((await fs.readdir(dir)).sort()).toEqual(['salary_slip_7.csv', 'salary_slip_9.csv']);
    expect((await fs.stat(path.join(dir, 'salary_slip_7.csv'))).isFile()).toBe(true);
  });

  it('returns null without data', async () => {
    expect(await generateSalarySlips(null, dir, { logger: silentLogger() })).toBeNull();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('produces identical rows apart from the timestamp on a re-run', async () => {
    const first = path.join(dir, 'first');
    const second = path.join(dir, 'second');
    await generateSalarySlips(records, first, { logger: silentLogger(), now: fixedClock(generatedAt) });
    await generateSalarySlips(records, second, { logger: silentLogger(), now: fixedClock(new Date(2025, 5, 1, 18, 0, 0)) });

    const stripTimestamp = (csv: string) => csv.split('\n').map((line) => line.split(',').slice(0, -1).join(','));
    for (const name of ['salary_slip_7.csv', 'salary_slip_12.csv']) {
      const a = await fs.readFile(path.join(first, name), 'utf8');
      const b = await fs.readFile(path.join(second, name), 'utf8');
      expect(a).not.toBe(b);
      expect(stripTimestamp(a)).toEqual(stripTimestamp(b));
    }
  });
});

describe('exportCompleteReport()', () => {
  it('writes one row per record plus the header', async () => {
    const file = path.join(dir, 'complete_salary_report.csv');
    const ok = await exportCompleteReport(records, file, { logger: silentLogger(), now: fixedClock(generatedAt) });

    expect(ok).toBe(true);
    const lines = (await fs.readFile(file, 'utf8')).split('\n');
    expect(lines).toEqual([
      'employee_id,name,basic_salary,bonus_percentage,tax_percentage,bonus,tax,net_salary,report_generated',
      '7,Ava Thompson,50000.00,10.00,15.00,5000.00,7500.00,47500.00,2024-01-31 09:05:07',
      '9,"Patel, Noah",60000.00,12.00,18.00,7200.00,10800.00,56400.00,2024-01-31 09:05:07',
      '12,Mia Fernandes,45000.00,8.00,12.00,3600.00,5400.00,43200.00,2024-01-31 09:05:07',
      '',
    ]);
  });

  it('writes only the header for an empty set', async () => {
    const file = path.join(dir, 'reports', 'empty.csv');
    expect(await exportCompleteReport([], file, { logger: silentLogger(), now: fixedClock(generatedAt) })).toBe(true);
    expect(await fs.readFile(file, 'utf8')).toBe(
      'employee_id,name,basic_salary,bonus_percentage,tax_percentage,bonus,tax,net_salary,report_generated\n',
    );
  });

  it('returns false when the file cannot be written', async () => {
    const file = path.join(dir, 'taken');
    await fs.mkdir(file);
    expect(await exportCompleteReport(records, file, { logger: silentLogger() })).toBe(false);
  });

  it('returns false without data', async () => {
    expect(await exportCompleteReport(null, path.join(dir, 'r.csv'), { logger: silentLogger() })).toBe(false);
  });
});
