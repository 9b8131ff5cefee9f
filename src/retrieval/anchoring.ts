export interface QueryAnchor {
  anchor(query: string): string;
}

/** Prepends the institution name to queries that mention none of its keywords. */
export class KeywordAnchor implements QueryAnchor {
  private readonly keywords: string[];

  constructor(
    private readonly phrase: string,
    keywords: string[]
  ) {
    this.keywords = keywords.map((k) => k.toLowerCase()).filter(Boolean);
  }

  anchor(query: string): string {
    const lower = query.toLowerCase();
    if (this.keywords.some((k) => lower.includes(k))) return query;
    return `${this.phrase} ${query}`;
  }
}

export const noopAnchor: QueryAnchor = {
  anchor: (query) => query
};
