/**
 * Mesh Client: Directory Listing Parser
 *
 * The chunk store enumerates keys from the service's HTML index page.
 * The page format is not versioned, so the parser fails loudly when a
 * non-empty page yields no anchors.
 */

import { MeshConnectError } from './errors';

const ANCHOR_HREF = /<(?:a|A)\s+(?:[^>]*?\s+)?(?:href|HREF)=["']([^"']+)/g;

/** Listing format understood by this parser. */
export const LISTING_FORMAT_VERSION = 1;

/**
 * Extract anchor hrefs from an HTML listing.
 * Empty (or whitespace-only) bodies list nothing.
 */
export function parseDirectoryListing(html: string): string[] {
    if (html.trim() === '') return [];
    const links: string[] = [];
    for (const match of html.matchAll(ANCHOR_HREF)) {
        links.push(match[1]);
    }
    if (links.length === 0) {
        throw new MeshConnectError(
            `Unrecognised directory listing (format v${LISTING_FORMAT_VERSION}): no anchors found`
        );
    }
    return links;
}
