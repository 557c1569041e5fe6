import { Announcement } from './Announcement';

/**
 * Result of running one source extractor.
 *
 * Callers outside the service only ever see `announcements`; the status
 * keeps "source unreachable" and "page layout changed" apart in the logs.
 */
export type ExtractionOutcome =
    | {
        status: 'ok';
        url: string;
        announcements: Announcement[];
    }
    | {
        status: 'fetch-failed';
        url: string;
        /** Always empty */
        announcements: Announcement[];
        error: string;
    }
    | {
        status: 'structure-missing';
        url: string;
        /** Always empty */
        announcements: Announcement[];
        /** Selector of the first anchor step that matched nothing */
        missing: string;
    };
