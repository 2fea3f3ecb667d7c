import { monotonicFactory } from 'ulidx';

// Monotonic so ids generated within one millisecond still sort in creation order
const nextUlid = monotonicFactory();

export function generateId(): string {
  return nextUlid().toLowerCase();
}
