/**
 * URL utility functions
 */

/**
 * Ensure URL has protocol
 * @param url - URL or bare domain that may or may not have a protocol
 * @returns URL with https:// protocol when none was given
 */
export function ensureProtocol(url: string): string {
  if (/^https?:\/\//i.test(url)) {
    return url;
  }
  return `https://${url}`;
}

/**
 * Normalize an inbound queue payload into a bare domain.
 * Accepts "example.com", " Example.com\n" or "https://example.com/path".
 */
export function normalizeDomain(input: string): string {
  const trimmed = input.trim();
  try {
    return new URL(ensureProtocol(trimmed)).hostname.toLowerCase();
  } catch {
    return trimmed
      .replace(/^https?:\/\//i, '')
      .split('/')[0]
      .toLowerCase();
  }
}

/**
 * Host (with port, if any) of a URL, or '' when it cannot be parsed
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Compare hosts before and after navigation.
 * @returns The final host when the page ended up elsewhere, else false
 */
export function redirectDomain(initialUrl: string, finalUrl: string): string | false {
  const initialHost = hostOf(initialUrl);
  const finalHost = hostOf(finalUrl);
  return initialHost !== finalHost ? finalHost : false;
}

/**
 * Path component of a script URL ("/static/app.js")
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '';
  }
}
