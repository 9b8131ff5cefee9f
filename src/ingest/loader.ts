import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from '../errors.js';
import { CorpusRecord } from '../types.js';
import { extractPage } from './extractors.js';

export interface RecordDefaults {
  defaultUrl: string;
  defaultSection: string;
}

export interface LoadResult {
  /** Raw entries in load order; validated one at a time by the build. */
  entries: unknown[];
  filesRead: number;
  filesSkipped: number;
}

const JSON_EXT = /\.json$/i;
const HTML_EXT = /\.html?$/i;

export function coerceRecord(entry: unknown, defaults: RecordDefaults): CorpusRecord {
  if (!entry || typeof entry !== 'object' || Array.isArray(entry)) {
    throw new TypeError(`expected an object, got ${Array.isArray(entry) ? 'array' : typeof entry}`);
  }
  const content = 'content' in entry ? entry.content : '';
  const url = 'url' in entry ? entry.url : undefined;
  const section = 'section' in entry ? entry.section : undefined;

  let text = '';
  if (typeof content === 'string') {
    text = content;
  } else if (content !== undefined && content !== null) {
    throw new TypeError(`content must be a string, got ${typeof content}`);
  }
  return {
    content: text,
    url: typeof url === 'string' && url.trim() ? url : defaults.defaultUrl,
    section: typeof section === 'string' && section.trim() ? section : defaults.defaultSection
  };
}

export function recordsFromHtml(html: string, defaults: RecordDefaults): CorpusRecord[] {
  const page = extractPage(html, defaults.defaultUrl);
  const url = page.canonicalUrl || defaults.defaultUrl;
  return page.sections.map((s) => ({
    content: s.body,
    url,
    section: s.title || page.title || defaults.defaultSection
  }));
}

/**
 * Reads every `*.json` (an array of records) and `*.html` page in `dir`, in
 * file-name order. Unreadable files and JSON that is not an array are
 * reported and skipped.
 */
export function loadRecordEntries(
  dir: string,
  defaults: RecordDefaults,
  onWarning: (message: string) => void = (m) => console.warn(m)
): LoadResult {
  const result: LoadResult = { entries: [], filesRead: 0, filesSkipped: 0 };
  if (!fs.existsSync(dir)) {
    onWarning(`Data directory not found: ${dir}`);
    return result;
  }

  const files = fs
    .readdirSync(dir)
    .filter((f) => JSON_EXT.test(f) || HTML_EXT.test(f))
    .sort();

  for (const file of files) {
    const fullPath = path.join(dir, file);
    try {
      const raw = fs.readFileSync(fullPath, 'utf8');
      if (JSON_EXT.test(file)) {
        const data: unknown = JSON.parse(raw);
        if (!Array.isArray(data)) {
          onWarning(`Skipping ${file}: not a list of records`);
          result.filesSkipped++;
          continue;
        }
        result.entries.push(...data);
      } else {
        result.entries.push(...recordsFromHtml(raw, defaults));
      }
      result.filesRead++;
    } catch (error) {
      onWarning(`Skipping ${file}: ${errorMessage(error)}`);
      result.filesSkipped++;
    }
  }

  return result;
}
