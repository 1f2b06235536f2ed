export interface Source {
  title: string;
  url: string | null;
  author: string | null;
  date: string | null;
  description: string;
}

export interface ParsedResponse {
  mainContent: string;
  sourcesSection: string | null;
  hasSources: boolean;
  sources: Source[];
}

/** Splits a model answer into display text and structured citations. */
export interface ResponseFormatter {
  parse(text: string): ParsedResponse;
}

const SOURCE_MARKER = /sources:|references:|citations:/i;

function normalizeUrl(url: string): string {
  return /^https?:\/\//i.test(url) ? url : `https://${url}`;
}

function parseSourceItem(item: string): Source {
  const titleMatch = /^(.*?)(?::|\.|\n|$)/.exec(item);
  const title = titleMatch?.[1]?.trim() || 'Unknown Source';

  const urlMatch = /(?:https?:\/\/|\bwww\.)\S+/i.exec(item);
  const url = urlMatch ? normalizeUrl(urlMatch[0].replace(/[.,)\]]+$/, '')) : null;

  const authorMatch = /\b(?:by|authors?:?)\s+([^,.(\n]+)/i.exec(item);
  const author = authorMatch?.[1]?.trim() || null;

  const dateMatch = /(?:\(|\[|\s)(\d{4}(?:-\d{2}-\d{2})?|[A-Za-z]+ \d{1,2},? \d{4})(?:\)|\]|\.|,|\s|$)/.exec(item);
  const date = dateMatch?.[1] ?? null;

  let description = title === 'Unknown Source' ? item : item.replace(title, '').trim();
  description = description.replace(/^[:.,]\s*/, '');

  return { title, url, author, date, description };
}

export function parseSources(sourcesText: string): Source[] {
  const clean = sourcesText.replace(/^(?:sources|references|citations):?\s*/i, '');

  return clean
    .split(/\n\s*(?:\d+\.|-)\s*/)
    .map(item => item.replace(/^(?:\d+\.|-)\s*/, '').trim())
    .filter(item => item.length > 0)
    .map(parseSourceItem);
}

export function parseResponse(text: string): ParsedResponse {
  const marker = SOURCE_MARKER.exec(text);

  if (!marker) {
    return { mainContent: text, sourcesSection: null, hasSources: false, sources: [] };
  }

  const sourceIndex = marker.index;

  const sourcesSection = text.slice(sourceIndex).trim();
  return {
    mainContent: text.slice(0, sourceIndex).trim(),
    sourcesSection,
    hasSources: true,
    sources: parseSources(sourcesSection)
  };
}

export const defaultFormatter: ResponseFormatter = { parse: parseResponse };
