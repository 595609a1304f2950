// Always a new array, even when nothing is excluded
export function subtract(source: readonly string[], ...exclude: string[]): string[] {
  const skip = new Set(exclude);
  return source.filter((s) => !skip.has(s));
}

export function unique(source: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const s of source) {
    if (seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  return out;
}
