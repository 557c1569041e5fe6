import * as cheerio from 'cheerio';
import { Announcement } from '../../domain/entities/Announcement';
import { BaseAnnouncementExtractor, ParsedPage } from './BaseAnnouncementExtractor';

export const BANGALORE_NOTIFICATIONS_URL = 'https://bangaloreuniversity.karnataka.gov.in/notifications';

/**
 * Bangalore University notifications.
 *
 * Notices are the top-level items of the first list inside the page container;
 * nested sub-lists belong to their parent notice and are not split out.
 */
export class BangaloreAnnouncementExtractor extends BaseAnnouncementExtractor {
    readonly university = 'Bangalore' as const;
    readonly url = BANGALORE_NOTIFICATIONS_URL;

    protected parse($: cheerio.CheerioAPI): ParsedPage {
        const container = $('div.container').first();
        if (container.length === 0) {
            return this.anchorMissing('div.container');
        }

        const list = container.find('ul').first();
        if (list.length === 0) {
            return this.anchorMissing('div.container ul');
        }

        const announcements: Announcement[] = [];
        list.children('li').each((_, element) => {
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
