import { describeError } from './errors';
import { generateSalarySlips, exportCompleteReport } from './export/csvExport';
import { generateSalarySlipPdfs } from './export/pdfExport';
import type { Logger } from './logger';
import { addNewEmployee } from './payroll/addEmployee';
import { deriveSalaryComponents } from './payroll/calculate';
import { formatSalarySummary } from './payroll/summary';
import type { EmployeeStore } from './store/EmployeeStore';
import type { Clock, EmployeeRecord, LineWriter, NewEmployeeInput } from './types';

export type PayrollRunDeps = {
  store: EmployeeStore;
  logger: Logger;
  out: LineWriter;
  now?: Clock;
};

export type PayrollRunOptions = {
  slipOutputDir: string;
  reportFile: string;
  pdfSlips?: boolean;
  newEmployee?: NewEmployeeInput;
};

export type PayrollStep = 'connect' | 'fetch' | 'calculate' | 'unexpected';

export type PayrollRunOutcome = {
  ok: boolean;
  abortedAt?: PayrollStep;
  employeeCount: number;
  slipFiles: string[];
  pdfFiles: string[];
  reportFile?: string;
  newEmployeeId?: number;
};

const BANNER = '='.repeat(60);

export async function fetchEmployeeData(store: EmployeeStore, logger: Logger): Promise<EmployeeRecord[] | null> {
  try {
    const records = await store.fetchAll();
    logger.info({ count: records.length }, 'Successfully fetched employee records');
    return records;
  } catch (err) {
    logger.error(describeError(err));
    return null;
  }
}

export async function connectDatabase(store: EmployeeStore, logger: Logger): Promise<boolean> {
  try {
    await store.connect();
    logger.info('Successfully connected to database');
    return true;
  } catch (err) {
    logger.error(describeError(err));
    return false;
  }
}

/**
 * connect -> fetch -> calculate -> summary -> slips -> report -> optional insert.
 * Failures up to the calculation abort the run; the store is closed on every path.
 */
export async function runPayroll(deps: PayrollRunDeps, options: PayrollRunOptions): Promise<PayrollRunOutcome> {
  const { store, logger, out } = deps;
  const now = deps.now ?? (() => new Date());
  const outcome: PayrollRunOutcome = { ok: false, employeeCount: 0, slipFiles: [], pdfFiles: [] };

  out(BANNER);
  out('EMPLOYEE SALARY MANAGEMENT SYSTEM');
  out(BANNER);

  try {
    out('\n1. Connecting to database...');
    if (!(await connectDatabase(store, logger))) {
      out('Failed to connect to database. Please check your credentials.');
      return { ...outcome, abortedAt: 'connect' };
    }

    out('\n2. Fetching employee data...');
    const records = await fetchEmployeeData(store, logger);
    if (records === null) {
      out('Failed to fetch employee data.');
      return { ...outcome, abortedAt: 'fetch' };
    }

    out('\n3. Calculating salary components...');
    const derived = deriveSalaryComponents(records, logger);
    if (derived === null) {
      out('Failed to calculate salary components.');
      return { ...outcome, abortedAt: 'calculate' };
    }
    outcome.employeeCount = derived.length;

    out('\n4. Displaying salary summary...');
    formatSalarySummary(derived).forEach((line) => out(line));

    out('\n5. Generating individual salary slips...');
    const slips = await generateSalarySlips(derived, options.slipOutputDir, { logger, now });
    if (slips) {
      outcome.slipFiles = slips;
      out('Individual salary slips generated successfully!');
    }
    if (options.pdfSlips) {
      const pdfs = await generateSalarySlipPdfs(derived, options.slipOutputDir, { logger, now });
      if (pdfs) {
        outcome.pdfFiles = pdfs;
        out('PDF salary slips generated successfully!');
      }
    }

    out('\n6. Exporting complete salary report...');
    if (await exportCompleteReport(derived, options.reportFile, { logger, now })) {
      outcome.reportFile = options.reportFile;
      out('Complete salary report exported successfully!');
    }

    if (options.newEmployee) {
      out('\n7. Adding new employee...');
      const id = await addNewEmployee(store, options.newEmployee, logger);
      if (id !== null) {
        outcome.newEmployeeId = id;
        out(`New employee added with ID: ${id}`);
      }
    }

    out(`\n${BANNER}`);
    out('SYSTEM EXECUTION COMPLETED SUCCESSFULLY!');
    out(BANNER);
    return { ...outcome, ok: true };
  } catch (err) {
    logger.error(`An error occurred during system execution: ${describeError(err)}`);
    return { ...outcome, abortedAt: 'unexpected' };
  } finally {
    await closeStore(store, logger);
  }
}

export async function closeStore(store: EmployeeStore, logger: Logger): Promise<void> {
  try {
    await store.close();
    logger.info('Database connection closed');
  } catch (err) {
    logger.error(`Error closing database connection: ${describeError(err)}`);
  }
}
