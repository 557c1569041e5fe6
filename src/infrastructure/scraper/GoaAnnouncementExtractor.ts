import * as cheerio from 'cheerio';
import { Announcement, createDetailedAnnouncement } from '../../domain/entities/Announcement';
import { BaseAnnouncementExtractor, ParsedPage } from './BaseAnnouncementExtractor';

export const GOA_ANNOUNCEMENTS_URL = 'https://www.unigoa.ac.in/systems/c/admissions/announcementsnotices.html';

/**
 * Goa University admission announcements.
 *
 * Each notice is an h4 heading; a bullet list directly after the heading
 * holds its details.
 */
export class GoaAnnouncementExtractor extends BaseAnnouncementExtractor {
    readonly university = 'Goa' as const;
    readonly url = GOA_ANNOUNCEMENTS_URL;

    protected parse($: cheerio.CheerioAPI): ParsedPage {
        const wrapper = $('div.details1').first();
        if (wrapper.length === 0) {
            return this.anchorMissing('div.details1');
        }

        const column = wrapper.find('div.details1_left').first();
        if (column.length === 0) {
            return this.anchorMissing('div.details1 div.details1_left');
        }

        const announcements: Announcement[] = [];
        column.find('h4').each((_, element) => {
            const heading = $(element);
            const sibling = heading.next();
            const details = sibling.is('ul')
                ? sibling.find('li').toArray().map((li) => $(li).text().trim())
                : [];

            announcements.push(createDetailedAnnouncement(this.university, heading.text(), details));
        });

        return this.found(announcements);
    }
}
