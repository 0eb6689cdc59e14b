type PageSource = 'fbref' | 'understat';

/**
 * One page a scraper wants fetched, with enough context to label the result.
 */
type PageTarget = {
  source: PageSource;
  label: string;
  url: string;
};

export type { PageSource, PageTarget };
