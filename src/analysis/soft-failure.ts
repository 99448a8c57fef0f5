// Response texts containing any of these are treated as degraded output
export const SOFT_FAILURE_MARKERS = ['timeout', 'failed', 'connection', 'api returned status', 'api error'] as const;

export function isSoftFailureText(text: string): boolean {
  const lower = text.toLowerCase();
  return SOFT_FAILURE_MARKERS.some((marker) => lower.includes(marker));
}
