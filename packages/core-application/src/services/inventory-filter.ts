import { formatTopics, type FileRecord, type FileStatus } from "@file-inventory/core-domain";

export const ALL_STATUSES = "All";

export type FilterCriteria = {
  status?: FileStatus | typeof ALL_STATUSES;
  topicQuery?: string;
  textQuery?: string;
};

const EXCLUDE_FOLDER_PREFIX = "folder:";
const INCLUDE_FOLDER_PREFIX = "incfolder:";

export type ParsedTextQuery = {
  folderIncludes: string[];
  folderExcludes: string[];
  searchTerms: string[];
};

/** Split a comma-separated text query into folder filters and search terms. */
export function parseTextQuery(textQuery: string): ParsedTextQuery {
  const parsed: ParsedTextQuery = { folderIncludes: [], folderExcludes: [], searchTerms: [] };

  for (const raw of textQuery.split(",")) {
    const token = raw.trim();
    const lower = token.toLowerCase();

    if (lower.startsWith(EXCLUDE_FOLDER_PREFIX)) {
      const term = lower.slice(EXCLUDE_FOLDER_PREFIX.length).trim();
      if (term) parsed.folderExcludes.push(term);
    } else if (lower.startsWith(INCLUDE_FOLDER_PREFIX)) {
      const term = lower.slice(INCLUDE_FOLDER_PREFIX.length).trim();
      if (term) parsed.folderIncludes.push(term);
    } else if (token) {
      parsed.searchTerms.push(lower);
    }
  }
  return parsed;
}

function isPathLike(term: string): boolean {
  return ["\\", "/", ":"].some((ch) => term.includes(ch));
}

/**
 * Build a matcher for one lowercased search term. Path-like terms are literal;
 * anything else is a case-insensitive regular expression, or literal when it
 * does not compile.
 */
export function termMatcher(term: string): (haystack: string) => boolean {
  if (!isPathLike(term)) {
    try {
      const pattern = new RegExp(term, "i");
      return (haystack) => pattern.test(haystack);
    } catch {
      // not a valid expression, fall through to literal
    }
  }
  return (haystack) => haystack.includes(term);
}

export function searchableText(record: FileRecord): string {
  return [
    record.fileName,
    record.manualNotes,
    record.contentHint,
    formatTopics(record.topics),
    record.fullPath,
    record.lastModified,
  ]
    .join(" || ")
    .toLowerCase();
}

/**
 * Narrow records by status, then folder include/exclude, then free-text
 * terms, then topic terms. Blank criteria keep everything.
 */
export function filterRecords(records: readonly FileRecord[], criteria: FilterCriteria): FileRecord[] {
  let rows = [...records];

  if (criteria.status && criteria.status !== ALL_STATUSES) {
    const status = criteria.status;
    rows = rows.filter((r) => r.status === status);
  }

  const { folderIncludes, folderExcludes, searchTerms } = parseTextQuery(criteria.textQuery ?? "");

  if (folderIncludes.length > 0) {
    rows = rows.filter((r) => {
      const folder = r.folderPath.toLowerCase();
      return folderIncludes.some((t) => folder.includes(t));
    });
  }

  if (folderExcludes.length > 0) {
    rows = rows.filter((r) => {
      const folder = r.folderPath.toLowerCase();
      return !folderExcludes.some((t) => folder.includes(t));
    });
  }

  if (searchTerms.length > 0) {
    const matchers = searchTerms.map(termMatcher);
    rows = rows.filter((r) => {
      const text = searchableText(r);
      return matchers.every((m) => m(text));
    });
  }

  const topicTerms = (criteria.topicQuery ?? "")
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter((t) => t.length > 0);

  if (topicTerms.length > 0) {
    rows = rows.filter((r) => {
      const topics = formatTopics(r.topics).toLowerCase();
      return topicTerms.every((t) => topics.includes(t));
    });
  }

  return rows;
}
