/**
 * Same-origin link extraction and visible-text helpers
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { canonicalizeUrl } from './normalize.js';

const IGNORED_SCHEMES = /^(mailto|tel|javascript|data|vbscript):/i;

/**
 * Extract same-origin links from anchor elements.
 *
 * Relative hrefs resolve against `baseUrl`. A link is kept when its host
 * equals the base host; the scheme may differ. Links are canonicalized
 * (query, fragment and trailing slash removed) and de-duplicated.
 *
 * @param html - Page markup
 * @param baseUrl - Final URL of the page the markup came from
 * @returns Canonical URLs; iteration order is not meaningful
 */
export function extractLinks(html: string, baseUrl: string): Set<string> {
  const $ = cheerio.load(html);
  const baseHost = new URL(baseUrl).hostname.toLowerCase();
  const links = new Set<string>();

  $('a[href]').each((_, elem) => {
    const href = $(elem).attr('href')?.trim();
    if (!href || href.startsWith('#') || IGNORED_SCHEMES.test(href)) return;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch (e) {
      if (process.env.DEBUG) console.debug('[radar]', 'url parse failed:', e instanceof Error ? e.message : e);
      return;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return;
    if (resolved.hostname.toLowerCase() !== baseHost) return;

    links.add(canonicalizeUrl(resolved));
  });

  return links;
}

/** Document title: `<title>`, falling back to the first `<h1>` */
export function extractTitle(html: string): string {
  const $ = cheerio.load(html);
  const title = $('title').first().text().trim();
  if (title) return title;
  return $('h1').first().text().trim();
}

/**
 * Visible text of a page, whitespace-collapsed.
 * Script, style and template contents are dropped.
 */
export function extractVisibleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  const root: cheerio.Cheerio<AnyNode> = $('body').length > 0 ? $('body') : $.root();
  return root.text().replace(/\s+/g, ' ').trim();
}
