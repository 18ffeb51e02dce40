export function cleanText(value: string): string {
  return value
    .replace(/\u00a0/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Key used when comparing a scraped pharmacy name with a registry name.
 * Only case is folded; spacing and punctuation take part in the comparison.
 */
export function toNameCompareKey(value: string): string {
  return value.toLowerCase();
}

export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
