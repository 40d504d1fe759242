#!/usr/bin/env node
import 'reflect-metadata';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from './config';
import { describeError } from './errors';
import { createLogger, type Logger } from './logger';
import { createDataSource } from './ormconfig';
import { addNewEmployee } from './payroll/addEmployee';
import { closeStore, connectDatabase, runPayroll } from './pipeline';
import { TypeOrmEmployeeStore } from './store/TypeOrmEmployeeStore';
import type { NewEmployeeInput } from './types';

export type RunCliOptions = {
  outputDir?: string;
  reportFile?: string;
  pdf?: boolean;
  addName?: string;
  addBasic?: number;
  addBonus?: number;
  addTax?: number;
};

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

export function newEmployeeFromOptions(opts: RunCliOptions): NewEmployeeInput | undefined {
  if (opts.addName === undefined) {
    if (opts.addBasic !== undefined || opts.addBonus !== undefined || opts.addTax !== undefined) {
      throw new InvalidArgumentError('--add-basic, --add-bonus and --add-tax need --add-name.');
    }
    return undefined;
  }
  if (opts.addBasic === undefined) {
    throw new InvalidArgumentError('--add-basic is required together with --add-name.');
  }
  return {
    name: opts.addName,
    basicSalary: opts.addBasic,
    bonusPercentage: opts.addBonus ?? 0,
    taxPercentage: opts.addTax ?? 0,
  };
}

type Context = { config: AppConfig; logger: Logger; store: TypeOrmEmployeeStore };

function createContext(): Context {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const store = new TypeOrmEmployeeStore(createDataSource(config.database));
  return { config, logger, store };
}

const print = (line: string) => console.log(line);

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('salary-slips')
    .description('Derive bonus, tax and net salary for every employee and export salary slips')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Fetch employees, print the salary summary and write slips plus the complete report')
    .option('-o, --output-dir <dir>', 'directory for individual salary slips (default: SLIP_OUTPUT_DIR)')
    .option('-r, --report-file <file>', 'path of the complete report CSV (default: REPORT_FILE)')
    .option('--pdf', 'also render a PDF salary slip per employee')
    .option('--add-name <name>', 'insert one new employee after the export')
    .option('--add-basic <amount>', 'basic salary of the new employee', parseNumber)
    .option('--add-bonus <percent>', 'bonus percentage of the new employee (default: 0)', parseNumber)
    .option('--add-tax <percent>', 'tax percentage of the new employee (default: 0)', parseNumber)
    .action(async (opts: RunCliOptions) => {
      let newEmployee: NewEmployeeInput | undefined;
      try {
        newEmployee = newEmployeeFromOptions(opts);
      } catch (err) {
        program.error(describeError(err));
      }
      const { config, logger, store } = createContext();
      const outcome = await runPayroll(
        { store, logger, out: print },
        {
          slipOutputDir: opts.outputDir ?? config.slipOutputDir,
          reportFile: opts.reportFile ?? config.reportFile,
          pdfSlips: opts.pdf === true,
          newEmployee,
        },
      );
      if (!outcome.ok) process.exitCode = 1;
    });

  program
    .command('add-employee')
    .description('Insert one employee and print the generated id')
    .argument('<name>', 'employee name')
    .argument('<basicSalary>', 'basic salary', parseNumber)
    .argument('<bonusPercentage>', 'bonus percentage', parseNumber)
    .argument('<taxPercentage>', 'tax percentage', parseNumber)
    .action(async (name: string, basicSalary: number, bonusPercentage: number, taxPercentage: number) => {
      const { logger, store } = createContext();
      try {
        if (!(await connectDatabase(store, logger))) {
          process.exitCode = 1;
          return;
        }
        const id = await addNewEmployee(store, { name, basicSalary, bonusPercentage, taxPercentage }, logger);
        if (id === null) {
          process.exitCode = 1;
          return;
        }
        print(`New employee added with ID: ${id}`);
      } finally {
        await closeStore(store, logger);
      }
    });

  program
    .command('migrate')
    .description('Create the employees table, its indexes and the salary_summary view')
    .action(async () => {
      const config = loadConfig();
      const logger = createLogger(config.logLevel);
      const dataSource = createDataSource({ ...config.database, runMigrationsOnStart: false });
      await dataSource.initialize();
      try {
        const applied = await dataSource.runMigrations();
        logger.info({ migrations: applied.map((m) => m.name) }, 'Migrations complete');
      } finally {
        await dataSource.destroy();
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error('Fatal error', describeError(err));
      process.exit(1);
    });
}
