import 'reflect-metadata';
import { DataSource } from 'typeorm';
import type { DatabaseConfig } from './config';
import { Employee } from './entities/Employee';
import { CreateEmployeesTable1680000000000 } from './migrations/1680000000000-CreateEmployeesTable';

export function createDataSource(db: DatabaseConfig): DataSource {
  return new DataSource({
    type: 'postgres',
    // url, when given, overrides the individual connection fields
    url: db.url,
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.database,
    ssl: db.ssl ? { rejectUnauthorized: false } : false,
    entities: [Employee],
    migrations: [CreateEmployeesTable1680000000000],
    migrationsRun: db.runMigrationsOnStart,
    synchronize: false,
    logging: false,
  });
}
