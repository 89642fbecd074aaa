// CHANGE: Resolve mirror-relative links and build upload index URLs.
// WHY: Every hop of the redirect chain yields a path relative to the mirror origin.

/**
 * Resolve a possibly relative link against a base URL.
 *
 * @param base - Absolute base URL (mirror origin).
 * @param relative - Link target as found in the page.
 * @returns Absolute URL string.
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative.trim(), base).href;
}

/**
 * URL of one page of the category's upload index. Page 1 has no `/page/` segment.
 */
export function uploadsPageUrl(baseUrl: string, category: string, page: number): string {
  const query = `?appcategory=${encodeURIComponent(category)}`;
  return page === 1 ? `${baseUrl}/uploads/${query}` : `${baseUrl}/uploads/page/${page}/${query}`;
}
