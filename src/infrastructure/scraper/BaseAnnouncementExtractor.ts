import * as cheerio from 'cheerio';
import {
    Announcement,
    UniversityName,
    createLinkedAnnouncement,
} from '../../domain/entities/Announcement';
import { ExtractionOutcome } from '../../domain/entities/ExtractionOutcome';
import { IAnnouncementExtractor } from '../../domain/ports/IAnnouncementExtractor';
import { IPageFetcher } from '../../domain/ports/IPageFetcher';

/**
 * What a source-specific parser found on the page.
 */
export type ParsedPage =
    | { kind: 'found'; announcements: Announcement[] }
    | { kind: 'anchor-missing'; selector: string };

/**
 * Text and link pulled from a list item that may wrap an anchor.
 */
export interface LinkedItem {
    /** Full text of the item */
    itemText: string;
    /** Text of the first anchor inside the item ('' when there is none) */
    anchorText: string;
    /** href of that anchor, if any */
    href: string | undefined;
}

/**
 * Fetch-then-parse skeleton shared by the university scrapers.
 *
 * Subclasses only describe where the announcements live in the markup;
 * fetching, failure reporting and link resolution happen here.
 */
export abstract class BaseAnnouncementExtractor implements IAnnouncementExtractor {
    abstract readonly university: UniversityName;
    abstract readonly url: string;

    constructor(protected readonly fetcher: IPageFetcher) { }

    async extract(signal?: AbortSignal): Promise<ExtractionOutcome> {
        let html: string;
        try {
            html = await this.fetcher.fetchHtml(this.url, { signal });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[${this.university}] Error fetching announcements from ${this.url}: ${message}`);
            return { status: 'fetch-failed', url: this.url, announcements: [], error: message };
        }

        const parsed = this.parse(cheerio.load(html));

        if (parsed.kind === 'anchor-missing') {
            console.warn(`[${this.university}] Page layout changed: "${parsed.selector}" not found at ${this.url}`);
            return { status: 'structure-missing', url: this.url, announcements: [], missing: parsed.selector };
        }

        console.log(`[${this.university}] Extracted ${parsed.announcements.length} announcement(s)`);
        return { status: 'ok', url: this.url, announcements: parsed.announcements };
    }

    /**
     * Locates the announcement region of the page and reads its items in document order.
     */
    protected abstract parse($: cheerio.CheerioAPI): ParsedPage;

    protected found(announcements: Announcement[]): ParsedPage {
        return { kind: 'found', announcements };
    }

    protected anchorMissing(selector: string): ParsedPage {
        return { kind: 'anchor-missing', selector };
    }

    /**
     * Builds an announcement from a list item.
     * The anchor wins when it carries an href; otherwise the whole item text is the title.
     */
    protected toLinkedAnnouncement(item: LinkedItem): Announcement {
        if (item.href) {
            return createLinkedAnnouncement(this.university, item.anchorText, this.resolveLink(item.href));
        }
        return createLinkedAnnouncement(this.university, item.itemText, null);
    }

    /**
     * Resolves an href against the page URL. Returns null for hrefs that do not form a valid URL.
     */
    protected resolveLink(href: string): string | null {
        try {
            return new URL(href.trim(), this.url).toString();
        } catch {
            console.warn(`[${this.university}] Ignoring unresolvable link "${href}"`);
            return null;
        }
    }
}
