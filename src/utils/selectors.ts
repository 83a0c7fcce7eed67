/**
 * Text-matching selector built on puppeteer's `::-p-text()` pseudo-element.
 * Matches the deepest element under `scope` whose text contains `text`.
 */
export function withText(scope: string, text: string): string {
  return `${scope} ::-p-text(${JSON.stringify(text)})`;
}

/**
 * Join alternative CSS selectors into one selector list
 */
export function anyOf(...selectors: string[]): string {
  return selectors.join(", ");
}
