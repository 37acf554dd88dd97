export interface WebSearchHit {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface WebSearchOptions {
  readonly maxResults: number;
  readonly signal?: AbortSignal;
}

export interface WebSearchClient {
  search(query: string, options: WebSearchOptions): Promise<readonly WebSearchHit[]>;
}
