export const PARTICIPANT_COLORS = [
  '#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4',
  '#FFEAA7', '#DDA0DD', '#FF9FF3', '#54A0FF',
] as const;

function hashCode(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash |= 0;
  }
  return hash;
}

/**
 * Deterministic color for an account, so every client shows the same one.
 */
export function participantColor(accountId: string): string {
  return PARTICIPANT_COLORS[Math.abs(hashCode(accountId)) % PARTICIPANT_COLORS.length] ?? PARTICIPANT_COLORS[0];
}
