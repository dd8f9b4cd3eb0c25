import { extractCompanySignals } from '../company-signals';
import { PageCategory } from '../../../modules/scraper/scraper.types';
import { createCategorizedPage } from '../../../__tests__/helpers/fixtures';

describe('extractCompanySignals', () => {
  it('should collect tagline, products, site name and section flags', () => {
    const signals = extractCompanySignals([
      createCategorizedPage(PageCategory.HOME, {
        h1: 'Billing that closes the books',
        structuredData: { ogTitle: 'Acme' },
      }),
      createCategorizedPage(PageCategory.PRODUCT, { h1: 'Ledger Sync' }),
      createCategorizedPage(PageCategory.PRODUCT, { title: 'Invoice Studio' }),
      createCategorizedPage(PageCategory.PRODUCT, { h1: 'ledger sync' }),
      createCategorizedPage(PageCategory.PRODUCT, { h1: 'x'.repeat(80) }),
      createCategorizedPage(PageCategory.PRICING, { structuredData: { ogSiteName: 'Acme Ledger' } }),
      createCategorizedPage(PageCategory.BLOG, { structuredData: { ogSiteName: 'Acme Blog' } }),
    ]);

    expect(signals).toEqual({
      tagline: 'Billing that closes the books',
      products: ['Ledger Sync', 'Invoice Studio'],
      siteName: 'Acme Ledger',
      hasPricing: true,
      hasBlog: true,
      hasCareers: false,
    });
  });

  it('should cut a long tagline to its first sentence', () => {
    const signals = extractCompanySignals([
      createCategorizedPage(PageCategory.HOME, {
        metaDescription:
          'Acme Ledger automates invoicing, reconciliation and reporting for finance teams at companies of every size and stage. ' +
          'It also integrates with every major bank.',
      }),
    ]);

    expect(signals.tagline).toBe(
      'Acme Ledger automates invoicing, reconciliation and reporting for finance teams at companies of every size and stage.'
    );
  });

  it('should leave the tagline empty without a homepage', () => {
    const signals = extractCompanySignals([createCategorizedPage(PageCategory.CAREERS, { h1: 'Join us' })]);

    expect(signals.tagline).toBe('');
    expect(signals.hasCareers).toBe(true);
  });
});
