import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const booleanFlag = z.enum(['true', 'false']).default('false').transform((v) => v === 'true');

const envSchema = z.object({
  /** Full connection string; takes precedence over the DB_* parts */
  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().default('employee_salary_management'),
  DB_SSL: booleanFlag,
  RUN_MIGRATIONS_ON_START: booleanFlag,

  SLIP_OUTPUT_DIR: z.string().min(1).default('salary_slips'),
  REPORT_FILE: z.string().min(1).default('complete_salary_report.csv'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type DatabaseConfig = {
  url?: string;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  ssl: boolean;
  runMigrationsOnStart: boolean;
};

export type AppConfig = {
  database: DatabaseConfig;
  slipOutputDir: string;
  reportFile: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration (${problems.join('; ')})`);
  }
  const e = parsed.data;
  return {
    database: {
      url: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      username: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      ssl: e.DB_SSL,
      runMigrationsOnStart: e.RUN_MIGRATIONS_ON_START,
    },
    slipOutputDir: e.SLIP_OUTPUT_DIR,
    reportFile: e.REPORT_FILE,
    logLevel: e.LOG_LEVEL,
  };
}

export function loadConfig(): AppConfig {
  dotenv.config({ path: path.resolve(process.cwd(), './.env') });
  return parseConfig(process.env);
}
