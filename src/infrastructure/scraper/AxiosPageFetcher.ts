import axios from 'axios';
import { FetchPageOptions, IPageFetcher, PageFetchError } from '../../domain/ports/IPageFetcher';

export interface AxiosPageFetcherOptions {
    timeout?: number;
    userAgent?: string;
    maxRedirects?: number;
}

/**
 * Page fetcher backed by axios.
 * Any response outside 2xx is rejected and reported as a PageFetchError.
 */
export class AxiosPageFetcher implements IPageFetcher {
    private readonly timeout: number;
    private readonly userAgent: string;
    private readonly maxRedirects: number;

    constructor(options?: AxiosPageFetcherOptions) {
        this.timeout = options?.timeout ?? 10000;
        this.userAgent = options?.userAgent ?? 'AdmissionAnnouncementsBot/1.0';
        this.maxRedirects = options?.maxRedirects ?? 5;
    }

    async fetchHtml(url: string, options?: FetchPageOptions): Promise<string> {
        try {
            const response = await axios.get<string>(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.5',
                },
                responseType: 'text',
                timeout: this.timeout,
                maxRedirects: this.maxRedirects,
                signal: options?.signal,
            });

            return typeof response.data === 'string' ? response.data : String(response.data);
        } catch (error) {
            throw this.toFetchError(url, error);
        }
    }

    private toFetchError(url: string, error: unknown): PageFetchError {
        if (axios.isCancel(error)) {
            return new PageFetchError(url, 'Request was cancelled');
        }
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new PageFetchError(url, `Request timed out after ${this.timeout}ms`);
            }
            if (error.response) {
                const { status, statusText } = error.response;
                const reason = statusText ? `${status} ${statusText}` : `${status}`;
                return new PageFetchError(url, `HTTP ${reason}`, status);
            }
            return new PageFetchError(url, error.message);
        }
        return new PageFetchError(url, error instanceof Error ? error.message : String(error));
    }
}
