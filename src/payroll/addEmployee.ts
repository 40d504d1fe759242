import { describeError } from '../errors';
import type { Logger } from '../logger';
import type { EmployeeStore } from '../store/EmployeeStore';
import type { NewEmployeeInput } from '../types';

/** Returns the generated employee id, or null when the insert failed. */
export async function addNewEmployee(
  store: EmployeeStore,
  input: NewEmployeeInput,
  logger: Logger,
): Promise<number | null> {
  try {
    const employeeId = await store.insert(input);
    logger.info({ employeeId }, 'New employee added successfully');
    return employeeId;
  } catch (err) {
    logger.error(`Error adding new employee: ${describeError(err)}`);
    return null;
  }
}
