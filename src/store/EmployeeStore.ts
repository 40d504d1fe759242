import type { EmployeeRecord, NewEmployeeInput } from '../types';

/**
 * Source and sink for employee rows. Implementations throw
 * StoreConnectionError, StoreQueryError or InsertError.
 */
export interface EmployeeStore {
  connect(): Promise<void>;
  /** Every employee, ordered by employee id. */
  fetchAll(): Promise<EmployeeRecord[]>;
  /** Inserts one employee and returns the id the store assigned. */
  insert(input: NewEmployeeInput): Promise<number>;
  close(): Promise<void>;
}
