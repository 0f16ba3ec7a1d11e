/**
 * Ordered selector lookups for scraped result pages. Search engines rename
 * their classes often, so every field is read through a list of alternatives
 * and the first selector that matches wins.
 */

export function normalizeText(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function selectFirst(root: ParentNode, selectors: readonly string[]): Element | null {
  for (const selector of selectors) {
    const element = root.querySelector(selector);
    if (element) return element;
  }
  return null;
}

export function selectFirstText(root: ParentNode, selectors: readonly string[]): string | null {
  const element = selectFirst(root, selectors);
  if (!element) return null;
  return normalizeText(element.textContent);
}

export function selectFirstAttribute(
  root: ParentNode,
  selectors: readonly string[],
  attribute: string
): string | null {
  const element = selectFirst(root, selectors);
  return element?.getAttribute(attribute) ?? null;
}
