import { randomUUID } from 'crypto';

export function newId(prefix: string): string {
  return `${prefix}-${randomUUID()}`;
}
