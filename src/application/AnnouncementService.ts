import { Announcement, UniversityName } from '../domain/entities/Announcement';
import { SourceDescriptor, SourceRegistry } from './SourceRegistry';

/**
 * Runs the university scrapers on demand.
 * Nothing is cached: each call hits the live pages.
 */
export class AnnouncementService {
    constructor(private readonly registry: SourceRegistry) { }

    listUniversities(): UniversityName[] {
        return this.registry.names();
    }

    findSource(university: string): SourceDescriptor | undefined {
        return this.registry.resolve(university);
    }

    /**
     * Scrapes every source concurrently and concatenates the results in
     * registry order, whatever order the fetches complete in.
     */
    async collectAll(signal?: AbortSignal): Promise<Announcement[]> {
        const perSource = await Promise.all(
            this.registry.list().map((source) => this.collectFrom(source, signal))
        );
        return perSource.flat();
    }

    /**
     * Scrapes a single source. Unreachable pages and changed layouts yield an empty list.
     */
    async collectFrom(source: SourceDescriptor, signal?: AbortSignal): Promise<Announcement[]> {
        const outcome = await source.extractor.extract(signal);
        return outcome.announcements;
    }
}
