/**
 * Options for a single page fetch.
 */
export interface FetchPageOptions {
    /** Aborts the request when the caller no longer needs the page */
    signal?: AbortSignal;
}

/**
 * Raised when a page cannot be retrieved: network failure, timeout,
 * cancellation or a non-2xx response.
 */
export class PageFetchError extends Error {
    constructor(
        public readonly url: string,
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'PageFetchError';
    }
}

/**
 * Port for retrieving the raw HTML of a remote page.
 */
export interface IPageFetcher {
    /**
     * Fetches a page and returns its body as text.
     * @throws PageFetchError if the page is unreachable or answers with a non-2xx status
     */
    fetchHtml(url: string, options?: FetchPageOptions): Promise<string>;
}
