import { SourceKey, UniversityName } from '../domain/entities/Announcement';
import { IAnnouncementExtractor } from '../domain/ports/IAnnouncementExtractor';

/**
 * A supported university and the scraper that reads its page.
 */
export interface SourceDescriptor {
    readonly key: SourceKey;
    readonly name: UniversityName;
    readonly url: string;
    readonly extractor: IAnnouncementExtractor;
}

/**
 * Immutable table of supported sources, kept in aggregation order.
 */
export class SourceRegistry {
    private readonly descriptors: readonly SourceDescriptor[];
    private readonly byKey: ReadonlyMap<string, SourceDescriptor>;

    constructor(extractors: readonly IAnnouncementExtractor[]) {
        const descriptors = extractors.map((extractor) => Object.freeze({
            key: toSourceKey(extractor.university),
            name: extractor.university,
            url: extractor.url,
            extractor,
        }));

        const byKey = new Map<string, SourceDescriptor>();
        for (const descriptor of descriptors) {
            if (byKey.has(descriptor.key)) {
                throw new Error(`Duplicate source registered: ${descriptor.name}`);
            }
            byKey.set(descriptor.key, descriptor);
        }

        this.descriptors = Object.freeze(descriptors);
        this.byKey = byKey;
    }

    /**
     * All sources, in the order their announcements are aggregated.
     */
    list(): readonly SourceDescriptor[] {
        return this.descriptors;
    }

    names(): UniversityName[] {
        return this.descriptors.map((descriptor) => descriptor.name);
    }

    /**
     * Case-insensitive lookup ("GOA", "goa" and "Goa" resolve alike).
     */
    resolve(university: string): SourceDescriptor | undefined {
        return this.byKey.get(university.toLowerCase());
    }
}

function toSourceKey(name: UniversityName): SourceKey {
    const keys: Record<UniversityName, SourceKey> = {
        Bangalore: 'bangalore',
        Goa: 'goa',
        Mumbai: 'mumbai',
    };
    return keys[name];
}
