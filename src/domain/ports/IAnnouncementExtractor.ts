import { UniversityName } from '../entities/Announcement';
import { ExtractionOutcome } from '../entities/ExtractionOutcome';

/**
 * Port for a per-university announcement scraper.
 * Implementations never throw for fetch or layout problems; those are
 * reported through the outcome status.
 */
export interface IAnnouncementExtractor {
    readonly university: UniversityName;
    readonly url: string;

    extract(signal?: AbortSignal): Promise<ExtractionOutcome>;
}
