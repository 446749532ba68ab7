/**
 * Test Fixtures
 * Listing and search result pages shaped like the live ones
 */

export const LONG_ABSTRACT =
  'This project measures how quickly native moss species recolonize burned forest soil and compares ' +
  'recovery rates across three elevations over two growing seasons.';

export interface ListingPageOptions {
  title?: string | null;
  category?: string;
  year?: string;
  booth?: string;
  country?: string;
  finalists?: string;
  awards?: string;
  abstract?: string;
}

function labelled(label: string, value: string | undefined): string {
  return value === undefined ? '' : `    <p><strong>${label}:</strong> ${value}</p>\n`;
}

export function listingPage(options: ListingPageOptions = {}): string {
  const title = options.title === undefined ? 'Moss Recovery After Wildfire' : options.title;
  return `<!DOCTYPE html>
<html>
<head><title>Society Abstracts</title></head>
<body>
  <nav class="navbar"><a href="/">Home</a></nav>
  <div class="container">
${title === null ? '' : `    <h2>${title}</h2>\n`}${labelled('Finalist Names', options.finalists)}${labelled('Category', options.category)}${labelled('Year', options.year)}${labelled('Booth Id', options.booth)}${labelled('Country', options.country)}${labelled('Awards Won', options.awards)}    <p>${options.abstract ?? LONG_ABSTRACT}</p>
  </div>
</body>
</html>`;
}

export const notFoundPage = `<!DOCTYPE html>
<html>
<body>
  <div class="container">
    <p>Project not found.</p>
  </div>
</body>
</html>`;

export const captchaPage = `<!DOCTYPE html>
<html><body><div class="g-recaptcha"></div><p>Please complete the CAPTCHA to continue.</p></body></html>`;

export interface SearchResult {
  href: string;
  title: string;
  snippet: string;
}

export function redirectLink(target: string): string {
  return `//duckduckgo.com/l/?uddg=${encodeURIComponent(target)}&rut=abc123`;
}

export function searchResultPage(results: SearchResult[]): string {
  const items = results
    .map(
      (result) => `    <div class="result">
      <a class="result__a" href="${result.href}">${result.title}</a>
      <a class="result__snippet">${result.snippet}</a>
    </div>`
    )
    .join('\n');

  return `<!DOCTYPE html>
<html>
<body>
  <form action="/html/"><input name="q"></form>
  <div id="links">
${items}
  </div>
  <div class="footer"><a href="mailto:feedback@duckduckgo.com">Feedback</a></div>
</body>
</html>`;
}

export const emptySearchPage = searchResultPage([]);
