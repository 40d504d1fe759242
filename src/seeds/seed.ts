import 'reflect-metadata';
import { In } from 'typeorm';
import { z } from 'zod';
import { loadConfig } from '../config';
import { Employee } from '../entities/Employee';
import { createLogger } from '../logger';
import { createDataSource } from '../ormconfig';
import data from './data.json';

const seedSchema = z.object({
  employees: z
    .array(
      z.object({
        name: z.string().min(1).max(100),
        basicSalary: z.number(),
        bonusPercentage: z.number().default(0),
        taxPercentage: z.number().default(0),
      }),
    )
    .default([]),
});

export type SeedData = z.infer<typeof seedSchema>;

export function parseSeedData(raw: unknown): SeedData {
  return seedSchema.parse(raw);
}

async function runSeed() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const dataSource = createDataSource(config.database);
  await dataSource.initialize();
  logger.info('DataSource initialized for seeding');

  try {
    const { employees } = parseSeedData(data);
    const repo = dataSource.getRepository(Employee);

    // insert only names not already present
    const existing = await repo.find({ select: { name: true }, where: { name: In(employees.map((e) => e.name)) } });
    const known = new Set(existing.map((e) => e.name));
    const fresh = employees.filter((e) => !known.has(e.name));
    if (fresh.length > 0) {
      await repo.save(fresh.map((e) => repo.create(e)));
    }

    logger.info({ inserted: fresh.length, skipped: employees.length - fresh.length }, 'Seeding complete');
  } finally {
    await dataSource.destroy();
  }
}

if (require.main === module) {
  runSeed().catch((err: unknown) => {
    console.error('Seed failed', err);
    process.exit(1);
  });
}
