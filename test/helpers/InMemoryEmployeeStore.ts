import { InsertError, StoreConnectionError, StoreQueryError } from '../../src/errors';
import type { EmployeeStore } from '../../src/store/EmployeeStore';
import type { EmployeeRecord, NewEmployeeInput } from '../../src/types';

export type StoreFailures = {
  connect?: boolean;
  fetch?: boolean;
  insert?: boolean;
};

export class InMemoryEmployeeStore implements EmployeeStore {
  connected = false;
  closeCalls = 0;
  readonly rows: EmployeeRecord[];
  private nextId: number;

  constructor(rows: EmployeeRecord[] = [], private readonly failures: StoreFailures = {}) {
    this.rows = [...rows];
    this.nextId = rows.reduce((max, r) => Math.max(max, r.employeeId), 0) + 1;
  }

  async connect(): Promise<void> {
    if (this.failures.connect) {
      throw new StoreConnectionError('Error connecting to database', { cause: new Error('ECONNREFUSED') });
    }
    this.connected = true;
  }

  async fetchAll(): Promise<EmployeeRecord[]> {
    if (!this.connected || this.failures.fetch) {
      throw new StoreQueryError('Error fetching employee data', { cause: new Error('relation "employees" does not exist') });
    }
    return [...this.rows].sort((a, b) => a.employeeId - b.employeeId);
  }

  async insert(input: NewEmployeeInput): Promise<number> {
    if (!this.connected || this.failures.insert) {
      throw new InsertError('Error adding new employee', { cause: new Error('value too long') });
    }
    const employeeId = this.nextId++;
    this.rows.push({ employeeId, ...input });
    return employeeId;
  }

  async close(): Promise<void> {
    this.connected = false;
    this.closeCalls += 1;
  }
}
