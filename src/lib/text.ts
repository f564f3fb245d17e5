// src/lib/text.ts

const TOKEN_RE = /\S+/g;

/** Whitespace-delimited token count. */
export function countWords(text: string): number {
  return (text ?? "").match(TOKEN_RE)?.length ?? 0;
}

/**
 * Character offset just past the n-th whitespace-delimited token, or the full
 * length when the text has fewer tokens. Keeps original spacing intact.
 */
export function offsetAfterWords(text: string, n: number): number {
  if (n <= 0) return 0;
  let seen = 0;
  for (const m of text.matchAll(TOKEN_RE)) {
    seen += 1;
    if (seen === n) return (m.index ?? 0) + m[0].length;
  }
  return text.length;
}

export function titleCase(key: string): string {
  return key
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function formatUsd(amount: number): string {
  return `$${amount.toLocaleString("en-US")}`;
}
