import * as cheerio from 'cheerio';
import { Announcement } from '../../domain/entities/Announcement';
import { BaseAnnouncementExtractor, ParsedPage } from './BaseAnnouncementExtractor';

export const MUMBAI_ANNOUNCEMENTS_URL = 'https://mu.ac.in/department-announcements';

const LIST_ITEM_SELECTOR = '#main .entry-content .wpb_text_column ul li';

/**
 * University of Mumbai department announcements (WordPress page builder markup).
 */
export class MumbaiAnnouncementExtractor extends BaseAnnouncementExtractor {
    readonly university = 'Mumbai' as const;
    readonly url = MUMBAI_ANNOUNCEMENTS_URL;

    protected parse($: cheerio.CheerioAPI): ParsedPage {
        const announcements: Announcement[] = [];

        $(LIST_ITEM_SELECTOR).each((_, element) => {
            const item = $(element);
            const anchor = item.find('a').first();
            announcements.push(this.toLinkedAnnouncement({
                itemText: item.text(),
                anchorText: anchor.text(),
                href: anchor.attr('href'),
            }));
        });

        return this.found(announcements);
    }
}
