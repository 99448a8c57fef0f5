export const formatMs = (ms: number): string => `${ms.toFixed(0)}ms`;

export type Priority = 'Low' | 'Medium' | 'High';

export function priorityFor(errorCount: number): Priority {
  if (errorCount === 0) return 'Low';
  if (errorCount <= 2) return 'Medium';
  return 'High';
}
