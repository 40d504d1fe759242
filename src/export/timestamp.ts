import { format } from 'date-fns';

export const GENERATED_AT_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export function formatGeneratedAt(date: Date): string {
  return format(date, GENERATED_AT_FORMAT);
}
