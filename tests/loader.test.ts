import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { coerceRecord, loadRecordEntries, recordsFromHtml } from '../src/ingest/loader.js';
import { extractSections } from '../src/ingest/extractors.js';

const defaults = { defaultUrl: 'https://example.edu', defaultSection: 'General' };

const CAMPUS_PAGE = `<!doctype html>
<html>
  <head>
    <title>Campus Life</title>
    <link rel="canonical" href="https://example.edu/campus-life" />
  </head>
  <body>
    <nav><a href="/">Home</a></nav>
    <article>
      <h2>Hostel</h2>
      <p>Separate hostels for men and women with mess facilities, reading rooms and round-the-clock security for every resident.</p>
      <p>Wi-Fi is available in every block, and each floor has a common room with newspapers and indoor games for students.</p>
      <h2>Transport</h2>
      <p>College buses cover the whole city every morning and evening, with routes planned around the main residential areas.</p>
      <p>Students can apply for a bus pass at the transport office during the first week of each semester.</p>
    </article>
  </body>
</html>`;

describe('coerceRecord', () => {
  it('fills in missing url and section', () => {
    expect(coerceRecord({ content: 'Fees are paid per semester.' }, defaults)).toEqual({
      content: 'Fees are paid per semester.',
      url: 'https://example.edu',
      section: 'General'
    });
    expect(coerceRecord({ content: 'x', url: '', section: 5 }, defaults)).toEqual({
      content: 'x',
      url: 'https://example.edu',
      section: 'General'
    });
  });

  it('treats absent content as empty', () => {
    expect(coerceRecord({ url: 'https://example.edu/a' }, defaults).content).toBe('');
    expect(coerceRecord({ content: null }, defaults).content).toBe('');
  });

  it('rejects entries that are not records', () => {
    expect(() => coerceRecord('text', defaults)).toThrow('expected an object, got string');
    expect(() => coerceRecord([], defaults)).toThrow('expected an object, got array');
    expect(() => coerceRecord({ content: ['a'] }, defaults)).toThrow('content must be a string, got object');
  });
});

describe('extractSections', () => {
  it('splits body text at headings and drops tiny sections', () => {
    const html =
      '<body><div><h2>Hostel</h2><p>Separate hostels for men and women with mess facilities.</p>' +
      '<p>Wi-Fi is available in every block.</p><h2>Transport</h2>' +
      '<p>College buses cover the whole city every morning.</p><h3>Tiny</h3><p>short</p></div></body>';

    expect(extractSections(html)).toEqual([
      { title: 'Hostel', body: 'Separate hostels for men and women with mess facilities. Wi-Fi is available in every block.' },
      { title: 'Transport', body: 'College buses cover the whole city every morning.' }
    ]);
  });
});

describe('recordsFromHtml', () => {
  it('uses the canonical url and keeps the readable text', () => {
    const records = recordsFromHtml(CAMPUS_PAGE, defaults);
    expect(records.length).toBeGreaterThan(0);
    expect(records.every((r) => r.url === 'https://example.edu/campus-life')).toBe(true);
    const text = records.map((r) => r.content).join(' ');
    expect(text).toContain('Separate hostels for men and women');
    expect(text).toContain('College buses cover the whole city');
  });
});

describe('loadRecordEntries', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kb-load-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads JSON arrays in file-name order and skips unusable files', () => {
    fs.writeFileSync(path.join(dir, 'b.json'), JSON.stringify([{ content: 'second file' }]));
    fs.writeFileSync(path.join(dir, 'a.json'), JSON.stringify([{ content: 'first file' }, 7]));
    fs.writeFileSync(path.join(dir, 'c.txt'), 'ignored');
    fs.writeFileSync(path.join(dir, 'd.json'), JSON.stringify({ content: 'not a list' }));
    fs.writeFileSync(path.join(dir, 'e.json'), 'not json');

    const warnings: string[] = [];
    const loaded = loadRecordEntries(dir, defaults, (m) => warnings.push(m));

    expect(loaded.entries).toEqual([{ content: 'first file' }, 7, { content: 'second file' }]);
    expect(loaded.filesRead).toBe(2);
    expect(loaded.filesSkipped).toBe(2);
    expect(warnings[0]).toBe('Skipping d.json: not a list of records');
    expect(warnings[1].startsWith('Skipping e.json: ')).toBe(true);
  });

  it('turns HTML pages into records', () => {
    fs.writeFileSync(path.join(dir, 'campus.html'), CAMPUS_PAGE);
    const loaded = loadRecordEntries(dir, defaults, () => {});
    expect(loaded.filesRead).toBe(1);
    expect(loaded.entries.length).toBeGreaterThan(0);
  });

  it('warns about a missing directory', () => {
    const warnings: string[] = [];
    const missing = path.join(dir, 'nope');
    const loaded = loadRecordEntries(missing, defaults, (m) => warnings.push(m));
    expect(loaded).toEqual({ entries: [], filesRead: 0, filesSkipped: 0 });
    expect(warnings).toEqual([`Data directory not found: ${missing}`]);
  });
});
