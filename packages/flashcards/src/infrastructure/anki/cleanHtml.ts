import { load } from 'cheerio';

/** Text content of an Anki field: tags dropped, entities decoded, whitespace collapsed. */
export function cleanHtml(html: string): string {
  const $ = load(html, null, false);
  return $.root().text().split(/\s+/).filter(Boolean).join(' ');
}
