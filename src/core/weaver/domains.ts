/**
 * @arch patternloom.core.domain
 *
 * Keyword-based domain detection for intent descriptions.
 */

export type Domain = 'cms' | 'ecommerce' | 'analytics';

/**
 * Checked in this order; the first family with a matching keyword wins.
 * "store" therefore selects e-commerce even in "analytics data store".
 */
export const DOMAIN_KEYWORDS: ReadonlyArray<{ domain: Domain; keywords: readonly string[] }> = [
  {
    domain: 'cms',
    keywords: ['cms', 'content management', 'content publishing', 'blog', 'article'],
  },
  {
    domain: 'ecommerce',
    keywords: ['e-commerce', 'ecommerce', 'shop', 'store', 'cart', 'checkout'],
  },
  {
    domain: 'analytics',
    keywords: ['analytics', 'dashboard', 'metrics', 'reporting', 'visualization'],
  },
];

/**
 * Case-insensitive substring match of the description against each family.
 */
export function detectDomain(description: string): Domain | null {
  const text = description.toLowerCase();
  for (const { domain, keywords } of DOMAIN_KEYWORDS) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      return domain;
    }
  }
  return null;
}
