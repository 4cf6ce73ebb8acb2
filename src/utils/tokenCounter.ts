/**
 * Token estimation. No tokenizer is bundled; counts are approximations used
 * for history statistics only.
 */

const CHARS_PER_TOKEN_ESTIMATE = 4;

/**
 * Approximate token count using the ~4 chars per token heuristic.
 */
export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN_ESTIMATE);
}

/**
 * Format token count for display (e.g., "12.3K").
 */
export function formatTokenCount(count: number): string {
  if (count < 1_000) {
    return String(count);
  }
  if (count < 1_000_000) {
    return `${(count / 1_000).toFixed(1)}K`;
  }
  return `${(count / 1_000_000).toFixed(1)}M`;
}
