/**
 * Extraction strategy contract.
 * Each field has an ordered list of strategies; the first non-null result wins.
 */

export interface ExtractionContext {
  /** "Now" for relative date arithmetic */
  referenceDate: Date;
}

export interface ExtractionStrategy<T> {
  readonly name: string;
  extract(text: string, context: ExtractionContext): T | null;
}

export function firstMatch<T>(
  strategies: readonly ExtractionStrategy<T>[],
  text: string,
  context: ExtractionContext
): T | null {
  for (const strategy of strategies) {
    const result = strategy.extract(text, context);
    if (result !== null) {
      return result;
    }
  }
  return null;
}
