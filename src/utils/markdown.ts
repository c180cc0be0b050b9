export interface MarkdownSection {
  heading: string;
  key: string;
  level: number;
  body: string;
}

const HEADING_PATTERN = /^(#{1,3})\s+(.+?)\s*#*\s*$/;
const LIST_ITEM_PATTERN = /^\s*(?:[-*+]|\d+[.)])\s+(.+)$/;

const STOPWORDS = new Set([
  'about', 'above', 'after', 'again', 'against', 'along', 'among', 'because',
  'before', 'being', 'below', 'between', 'both', 'could', 'during', 'each',
  'every', 'first', 'from', 'further', 'have', 'having', 'into', 'itself',
  'other', 'should', 'since', 'their', 'there', 'these', 'they', 'those',
  'through', 'under', 'until', 'where', 'which', 'while', 'within', 'without',
  'would', 'your', 'shall', 'must', 'will', 'with', 'that', 'this', 'than',
]);

/** Lowercase, punctuation-insensitive form used to compare headings. */
export function normalizeHeading(heading: string): string {
  return heading
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function parseSections(content: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  let current: MarkdownSection | null = null;
  const body: string[] = [];

  const flush = (): void => {
    if (current) {
      current.body = body.join('\n').trim();
      sections.push(current);
    }
    body.length = 0;
  };

  for (const line of content.split(/\r?\n/)) {
    const match = HEADING_PATTERN.exec(line);
    if (match) {
      flush();
      current = {
        heading: match[2],
        key: normalizeHeading(match[2]),
        level: match[1].length,
        body: '',
      };
    } else if (current) {
      body.push(line);
    }
  }
  flush();

  return sections;
}

export function findSection(sections: MarkdownSection[], heading: string): MarkdownSection | undefined {
  const key = normalizeHeading(heading);
  return sections.find((s) => s.key === key);
}

export function countWords(text: string): number {
  const words = text.match(/[A-Za-z0-9][\w'-]*/g);
  return words ? words.length : 0;
}

export function listItems(text: string): string[] {
  const items: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = LIST_ITEM_PATTERN.exec(line);
    if (match) items.push(match[1].trim());
  }
  return items;
}

/** Prose blocks: blank-line separated runs that are neither headings nor lists. */
export function paragraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0)
    .filter((block) => !HEADING_PATTERN.test(block.split('\n')[0]))
    .filter((block) => !block.split('\n').every((line) => LIST_ITEM_PATTERN.test(line)));
}

/**
 * The most frequent content terms of a text, ties broken alphabetically.
 * Deterministic for a given input.
 */
export function extractKeyTerms(text: string, limit: number = 10): string[] {
  const counts = new Map<string, number>();
  for (const raw of text.toLowerCase().match(/[a-z][a-z0-9-]{4,}/g) ?? []) {
    const term = raw.replace(/-+$/, '');
    if (term.length < 5 || STOPWORDS.has(term)) continue;
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, limit)
    .map(([term]) => term);
}
