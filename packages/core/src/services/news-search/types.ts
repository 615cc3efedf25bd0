export interface NewsArticle {
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly pubDate: string;
}

export interface NewsSearchClient {
  /** False for the disabled client; callers use fallback text then. */
  readonly available: boolean;
  search(query: string, limit: number): Promise<readonly NewsArticle[]>;
}
