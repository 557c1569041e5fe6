/**
 * Announcement Domain Entity
 *
 * A single admission notice scraped from a university website.
 * Every source produces the same superset of fields; fields a source
 * cannot provide are explicitly null.
 */

/**
 * Display names of the supported universities, in aggregation order.
 */
export const UNIVERSITY_NAMES = ['Bangalore', 'Goa', 'Mumbai'] as const;

export type UniversityName = (typeof UNIVERSITY_NAMES)[number];

/**
 * Lower-cased lookup key of a source (e.g. "bangalore").
 */
export type SourceKey = Lowercase<UniversityName>;

/** Title used when a scraped item has no text at all. */
export const UNTITLED = 'Untitled';

export interface Announcement {
    university: UniversityName;

    /** Never empty; falls back to {@link UNTITLED} */
    title: string;

    /** No current source publishes a description */
    description: string | null;

    /** Absolute URL, or null when the item has no usable link */
    link: string | null;

    /** Bullet points listed under the item (Goa only) */
    details: string[] | null;
}

/**
 * Normalizes scraped text into a title, substituting the placeholder for blanks.
 */
export function toTitle(text: string | undefined): string {
    const trimmed = (text ?? '').trim();
    return trimmed || UNTITLED;
}

/**
 * Creates an announcement for a source that lists linked notices.
 */
export function createLinkedAnnouncement(
    university: UniversityName,
    title: string,
    link: string | null
): Announcement {
    return {
        university,
        title: toTitle(title),
        description: null,
        link,
        details: null,
    };
}

/**
 * Creates an announcement for a source that lists headings with bullet details.
 */
export function createDetailedAnnouncement(
    university: UniversityName,
    title: string,
    details: string[]
): Announcement {
    return {
        university,
        title: toTitle(title),
        description: null,
        link: null,
        details,
    };
}
