export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function truncate(text: string, maxChars: number, suffix = '...'): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + suffix;
}
