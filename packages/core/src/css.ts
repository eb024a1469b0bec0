const FORBIDDEN_CSS_TOKENS = ["url("];

export function isValidCssSelector(selector: string): boolean {
  const normalized = selector.toLowerCase();
  return !FORBIDDEN_CSS_TOKENS.some((token) => normalized.includes(token));
}
