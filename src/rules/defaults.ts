/**
 * Default selector rule sets per scrape type.
 *
 * Used only when a target is created without custom selectors. Custom
 * selectors replace the defaults entirely; the two are never merged.
 */
import { createSelectorRule, type SelectorRuleInput } from './selector-rule.js';
import type { ScrapeType, SelectorRule } from './types.js';

const DEFAULT_RULE_INPUTS: Record<ScrapeType, SelectorRuleInput[]> = {
  news: [
    {
      fieldName: 'headlines',
      path: 'article h1, article h2, article h3, .news-item h2, .news-item h3, .story h2, .post h2',
      multiple: true,
    },
    {
      fieldName: 'links',
      path: 'article a[href], .news-item a[href], .story a[href]',
      multiple: true,
      transform: { kind: 'url', name: 'href' },
    },
    {
      fieldName: 'summaries',
      path: 'article p, .news-item p, .summary, .excerpt',
      multiple: true,
    },
    {
      fieldName: 'dates',
      path: 'article time[datetime], .news-item time[datetime]',
      multiple: true,
      transform: { kind: 'attribute', name: 'datetime' },
    },
    { fieldName: 'authors', path: '.author, .byline, .writer', multiple: true },
  ],
  product: [
    {
      fieldName: 'names',
      path: '.product-name, .product h2, .product h3, .product-item .title, .product-card .title',
      multiple: true,
    },
    { fieldName: 'prices', path: '.price, .cost, .amount', multiple: true },
    { fieldName: 'ratings', path: '.rating, .stars, .score', multiple: true },
    {
      fieldName: 'links',
      path: '.product a[href], .product-item a[href], .product-card a[href]',
      multiple: true,
      transform: { kind: 'url', name: 'href' },
    },
    {
      fieldName: 'images',
      path: '.product img[src], .product-item img[src], .product-card img[src]',
      multiple: true,
      transform: { kind: 'url', name: 'src' },
    },
    { fieldName: 'availability', path: '.availability, .stock, .in-stock', multiple: true },
  ],
  social: [
    {
      fieldName: 'posts',
      path: '.tweet .content, .post .content, .status .text, .message-body, .update p',
      multiple: true,
    },
    { fieldName: 'authors', path: '.username, .handle, .post .author, .tweet .author', multiple: true },
    {
      fieldName: 'timestamps',
      path: '.post time[datetime], .tweet time[datetime], .status time[datetime]',
      multiple: true,
      transform: { kind: 'attribute', name: 'datetime' },
    },
    { fieldName: 'likes', path: '.likes, .reactions, .hearts', multiple: true },
    { fieldName: 'hashtags', path: 'a.hashtag, a[href*="hashtag"]', multiple: true },
  ],
  generic: [
    { fieldName: 'title', path: 'title', multiple: false },
    { fieldName: 'headings', path: 'h1, h2, h3', multiple: true },
    { fieldName: 'paragraphs', path: 'p', multiple: true },
    {
      fieldName: 'links',
      path: 'a[href]',
      multiple: true,
      transform: { kind: 'url', name: 'href' },
    },
  ],
};

const cache = new Map<ScrapeType, readonly SelectorRule[]>();

/** Get the built-in rule set for a scrape type. */
export function getDefaultSelectors(scrapeType: ScrapeType): readonly SelectorRule[] {
  let rules = cache.get(scrapeType);
  if (!rules) {
    rules = Object.freeze(DEFAULT_RULE_INPUTS[scrapeType].map(createSelectorRule));
    cache.set(scrapeType, rules);
  }
  return rules;
}
