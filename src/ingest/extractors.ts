import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';

export interface ContentSection {
  title: string;
  body: string;
}

export interface ExtractedPage {
  title: string;
  canonicalUrl: string | null;
  sections: ContentSection[];
}

export function extractSections(html: string, baseUrl?: string): ContentSection[] {
  const dom = new JSDOM(html, baseUrl ? { url: baseUrl } : undefined);
  const doc = dom.window.document;

  const root = doc.querySelector('article') || doc.body;
  if (!root) return [];

  const sections: ContentSection[] = [];
  let currentTitle = '';
  let currentBody: string[] = [];

  const flush = () => {
    const bodyText = currentBody.join(' ').replace(/\s+/g, ' ').trim();
    if (bodyText) sections.push({ title: currentTitle, body: bodyText });
  };

  // Readability wraps content in nested divs; walk down to the first level with headings
  let container: Element = root;
  while (container.children.length === 1 && /^(div|section|article|main)$/i.test(container.children[0].tagName)) {
    container = container.children[0];
  }

  for (const node of Array.from(container.children)) {
    const tag = node.tagName.toLowerCase();

    if (/^h[1-6]$/.test(tag)) {
      flush();
      currentTitle = (node.textContent || '').replace(/\s+/g, ' ').trim();
      currentBody = [];
    } else {
      const text = (node.textContent || '').replace(/\s+/g, ' ').trim();
      if (text) currentBody.push(text);
    }
  }
  flush();

  return sections.filter((s) => s.body.length >= 20);
}

/** Reduces a scraped page to its readable article, split at headings. */
export function extractPage(html: string, baseUrl = 'https://localhost/'): ExtractedPage {
  const dom = new JSDOM(html, { url: baseUrl });
  const doc = dom.window.document;
  const canonical = doc.querySelector('link[rel="canonical"]')?.getAttribute('href')?.trim() || null;
  const pageTitle = doc.title.replace(/\s+/g, ' ').trim();

  const article = new Readability(doc).parse();
  const readableText = article?.textContent?.replace(/\s+/g, ' ').trim() || '';
  const title = article?.title?.trim() || pageTitle;

  if (!readableText) {
    const bodyText = new JSDOM(html).window.document.body?.textContent?.replace(/\s+/g, ' ').trim() || '';
    return { title, canonicalUrl: canonical, sections: bodyText ? [{ title: '', body: bodyText }] : [] };
  }

  const sections = article?.content ? extractSections(article.content, baseUrl) : [];
  return {
    title,
    canonicalUrl: canonical,
    sections: sections.length > 0 ? sections : [{ title: '', body: readableText }]
  };
}
