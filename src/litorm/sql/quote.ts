// sql/quote.ts

export function q(n: string): string {
  return `"${n.replace(/"/g, '""')}"`;
}
