import type { ParsedCardEntry, ParsedFundingMessage } from './types.js';

const GOV_DOMAIN_PATTERN = /[\w.-]+\.gov\b/g;

/**
 * Turn Slack's mrkdwn escaping back into plain text.
 * `<url|label>` becomes the label, `<url>` the url.
 */
export function decodeSlackText(text: string): string {
  return text
    .replace(/<([^<>|]+)\|([^<>]+)>/g, '$2')
    .replace(/<([^<>|]+)>/g, '$1')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

/**
 * Every `.gov` domain in a line, as https URLs, in order of appearance
 */
export function extractGovLinks(line: string): string[] {
  const links: string[] = [];
  for (const match of line.matchAll(GOV_DOMAIN_PATTERN)) {
    // "https://www.nsf.gov" yields "www.nsf.gov"; leading dots come from "..nih.gov"
    const domain = match[0].replace(/^[.-]+/, '').toLowerCase();
    const url = `https://${domain}`;
    if (!links.includes(url)) {
      links.push(url);
    }
  }
  return links;
}

function isIndented(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * Parse a funding announcement.
 *
 * ```
 * NSF Opportunities           <- list title
 * Cyber Grant                 <- card title
 *   Due in March, see nsf.gov <- description line, nsf.gov attached
 * ```
 */
export function parseFundingMessage(text: string): ParsedFundingMessage {
  const lines = text
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '');

  if (lines.length === 0) {
    return { listTitle: '', cards: [] };
  }

  const listTitle = decodeSlackText(lines[0].trim());
  const cards: ParsedCardEntry[] = [];
  let current: { title: string; descriptionLines: string[]; attachments: string[] } | null = null;

  for (const line of lines.slice(1)) {
    if (!isIndented(line)) {
      if (current) {
        cards.push(finishEntry(current));
      }
      current = { title: decodeSlackText(line.trim()), descriptionLines: [], attachments: [] };
      continue;
    }

    // Indented lines before the first title have no card to belong to
    if (!current) {
      continue;
    }

    const stripped = line.trim();
    for (const link of extractGovLinks(stripped)) {
      if (!current.attachments.includes(link)) {
        current.attachments.push(link);
      }
    }
    current.descriptionLines.push(decodeSlackText(stripped));
  }

  if (current) {
    cards.push(finishEntry(current));
  }

  return { listTitle, cards };
}

function finishEntry(entry: { title: string; descriptionLines: string[]; attachments: string[] }): ParsedCardEntry {
  return {
    title: entry.title,
    description: entry.descriptionLines.join('\n'),
    attachments: entry.attachments,
  };
}
