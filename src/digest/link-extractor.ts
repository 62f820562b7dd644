import { decodeEntities, stripInlineHtml } from "../utils/html.js";

export interface Anchor {
  text: string;
  url: string;
}

// Patterns to filter out non-content links
const SKIP_URL_PATTERNS = [
  /unsubscribe/i,
  /opt[_-]?out/i,
  /preferences?/i,
  /settings/i,
  /privacy[_-]?policy/i,
  /terms[_-]?of[_-]?service/i,
  /view[_-]?in[_-]?browser/i,
  /view[_-]?online/i,
  /update[_-]?profile/i,
  /forward[_-]?to[_-]?friend/i,
  /facebook\.com/i,
  /twitter\.com/i,
  /x\.com\/share/i,
  /linkedin\.com/i,
  /instagram\.com/i,
  /youtube\.com\/(channel|user)/i,
];

// Footer/nav link texts, English and Portuguese
const SKIP_TEXTS = [
  "unsubscribe",
  "manage preferences",
  "view in browser",
  "view it in",
  "privacy policy",
  "terms of service",
  "contact us",
  "follow us",
  "ver no navegador",
  "acesse este link",
  "cancelar inscrição",
  "descadastre",
  "©",
  "copyright",
];

function extractHref(anchorTag: string): string | null {
  const match = anchorTag.match(/href\s*=\s*["']([^"']+)["']/i);
  return match ? decodeEntities(match[1]).trim() : null;
}

function extractAnchorText(anchorTag: string): string {
  const textMatch = anchorTag.match(/<a[^>]*>([\s\S]*?)<\/a>/i);
  return textMatch ? stripInlineHtml(textMatch[1]) : "";
}

function shouldSkipUrl(url: string): boolean {
  return SKIP_URL_PATTERNS.some((pattern) => pattern.test(url));
}

function shouldSkipText(text: string): boolean {
  const lower = text.toLowerCase();
  return SKIP_TEXTS.some((skip) => lower.includes(skip));
}

function normalizeUrl(url: string): string | null {
  if (!url.startsWith("http://") && !url.startsWith("https://")) return null;

  try {
    return new URL(url).toString();
  } catch {
    return null;
  }
}

/**
 * Extract (anchor text, URL) pairs from a newsletter body.
 * Navigation, footer, social and mailto links are dropped; the first
 * occurrence of each URL wins and document order is kept.
 */
export function extractAnchors(html: string): Anchor[] {
  const anchors: Anchor[] = [];
  const seenUrls = new Set<string>();

  const anchorRegex = /<a\s[^>]*href\s*=\s*["'][^"']+["'][^>]*>[\s\S]*?<\/a>/gi;
  let match: RegExpExecArray | null;

  while ((match = anchorRegex.exec(html)) !== null) {
    const fullMatch = match[0];
    const href = extractHref(fullMatch);
    if (!href) continue;

    const url = normalizeUrl(href);
    if (!url || shouldSkipUrl(url)) continue;
    if (seenUrls.has(url)) continue;

    const text = extractAnchorText(fullMatch);

    // Image-only anchors and "read more" stubs carry nothing to match against
    if (text.length < 3) continue;
    if (shouldSkipText(text)) continue;
    if (text.startsWith("http://") || text.startsWith("https://")) continue;

    seenUrls.add(url);
    anchors.push({ text, url });
  }

  return anchors;
}
