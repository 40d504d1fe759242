import { DataSource } from 'typeorm';
import { Employee } from '../entities/Employee';
import { InsertError, StoreConnectionError, StoreQueryError } from '../errors';
import type { EmployeeRecord, NewEmployeeInput } from '../types';
import type { EmployeeStore } from './EmployeeStore';

export function toEmployeeRecord(e: Employee): EmployeeRecord {
  return {
    employeeId: e.employeeId,
    name: e.name,
    basicSalary: e.basicSalary,
    bonusPercentage: e.bonusPercentage,
    taxPercentage: e.taxPercentage,
  };
}

export class TypeOrmEmployeeStore implements EmployeeStore {
  constructor(private readonly dataSource: DataSource) {}

  async connect(): Promise<void> {
    if (this.dataSource.isInitialized) return;
    try {
      await this.dataSource.initialize();
    } catch (err) {
      throw new StoreConnectionError('Error connecting to database', { cause: err });
    }
  }

  async fetchAll(): Promise<EmployeeRecord[]> {
    try {
      const rows = await this.dataSource.getRepository(Employee).find({ order: { employeeId: 'ASC' } });
      return rows.map(toEmployeeRecord);
    } catch (err) {
      throw new StoreQueryError('Error fetching employee data', { cause: err });
    }
  }

  async insert(input: NewEmployeeInput): Promise<number> {
    const repo = this.dataSource.getRepository(Employee);
    try {
      const saved = await repo.save(repo.create(input));
      return saved.employeeId;
    } catch (err) {
      throw new InsertError('Error adding new employee', { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}
