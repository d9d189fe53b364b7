/**
 * Company Directory - ticker to company name lookup
 *
 * Unknown tickers fall back to the ticker itself.
 */

import companies from '../data/companies.json';

interface CompanyEntry {
  name: string;
  query: string;
}

const COMPANIES: Record<string, CompanyEntry> = companies;

export const CompanyDirectory = {
  /**
   * Display name, e.g. "Apple Inc." for AAPL
   */
  getCompanyName(ticker: string): string {
    return COMPANIES[ticker.toUpperCase()]?.name ?? ticker.toUpperCase();
  },

  /**
   * Short name used in full-text news queries, e.g. "Apple" for AAPL
   */
  getSearchName(ticker: string): string {
    return COMPANIES[ticker.toUpperCase()]?.query ?? ticker.toUpperCase();
  },

  listTickers(): string[] {
    return Object.keys(COMPANIES);
  }
};
