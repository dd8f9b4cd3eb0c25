/**
 * Test Fixtures
 * A small marketing site served by the fetch and crawler stubs
 */

import type { ExtractedPage, CategorizedPage } from '../../modules/scraper/scraper.types';
import { PageCategory } from '../../modules/scraper/scraper.types';

export const SITE_ORIGIN = 'https://acme.test';

export const homeHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Acme Ledger</title>
  <meta name="description" content="Acme Ledger automates invoicing for finance teams.">
  <meta property="og:site_name" content="Acme Ledger">
  <script type="application/ld+json">{"@type": "Organization", "name": "Acme Ledger"}</script>
</head>
<body>
  <header><nav>
    <a href="/">Home</a>
    <a href="/pricing">Pricing</a>
    <a href="/about">About</a>
    <a href="/company">Company</a>
    <a href="/blog">Blog</a>
    <a href="https://elsewhere.test/">Elsewhere</a>
  </nav></header>
  <main>
    <h1>Billing that closes the books</h1>
    <p>Acme Ledger sends invoices automatically.</p>
    <h2>Automated invoicing</h2>
  </main>
  <footer>Copyright Acme</footer>
</body>
</html>
`;

export const pricingHtml = `
<html>
<head>
  <title>Pricing - Acme Ledger</title>
  <meta name="description" content="Simple plans for growing teams.">
</head>
<body>
  <main>
    <h1>Pricing</h1>
    <p>The Starter plan costs 20 dollars per month.</p>
    <h2>Starter</h2>
    <h2>Scale</h2>
  </main>
</body>
</html>
`;

export const aboutHtml = `
<html>
<head><title>About Acme</title></head>
<body>
  <main>
    <h1>About us</h1>
    <p>Acme was founded in 2019 by two accountants.</p>
  </main>
</body>
</html>
`;

// Second "about" page: categorized by content ("who we are")
export const companyHtml = `
<html>
<head><title>Our company</title></head>
<body>
  <main>
    <h1>Who we are</h1>
    <p>We are a small group of accountants and engineers.</p>
  </main>
</body>
</html>
`;

export const blogHtml = `
<html>
<head><title>Blog</title></head>
<body>
  <main>
    <h1>Latest from the blog</h1>
    <p>Closing the books in three days.</p>
  </main>
</body>
</html>
`;

export const siteHtml: Record<string, string> = {
  [SITE_ORIGIN]: homeHtml,
  [`${SITE_ORIGIN}/pricing`]: pricingHtml,
  [`${SITE_ORIGIN}/about`]: aboutHtml,
  [`${SITE_ORIGIN}/company`]: companyHtml,
  [`${SITE_ORIGIN}/blog`]: blogHtml,
};

export function createPage(overrides: Partial<ExtractedPage> = {}): ExtractedPage {
  return {
    url: `${SITE_ORIGIN}/`,
    title: '',
    metaDescription: '',
    h1: '',
    headings: [],
    textPreview: '',
    structuredData: {},
    ...overrides,
  };
}

export function createCategorizedPage(
  category: PageCategory,
  overrides: Partial<ExtractedPage> = {}
): CategorizedPage {
  return { ...createPage(overrides), category };
}
