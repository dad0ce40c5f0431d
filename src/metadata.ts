// src/metadata.ts
import { sanitizeTrackName } from "./names";
import type { ReleaseMetadata, TrackDescriptor } from "./scraper";

export const MAX_TITLE_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 5000;

/** The platform rejects angle brackets in titles and descriptions. */
export function platformSafe(text: string): string {
    return text.replace(/</g, "‹").replace(/>/g, "›");
}

function truncate(text: string, max: number): string {
    return text.length > max ? text.slice(0, max - 1).trimEnd() + "…" : text;
}

export function formatPlaylistTitle(release: ReleaseMetadata): string {
    const parts = [release.performer, release.date, release.venue].filter(p => p && p !== "Unknown");
    const title = parts.length > 0 ? parts.join(" - ") : release.title;
    return truncate(platformSafe(title), MAX_TITLE_LENGTH);
}

export function formatPlaylistDescription(release: ReleaseMetadata): string {
    const lines = [
        release.title,
        "",
        `Performer: ${release.performer}`,
        `Venue: ${release.venue}`,
        `Date: ${release.date}`,
        "",
        "Tracklist:",
        ...release.tracks.map(t => `${t.number}. ${sanitizeTrackName(t.name, t.number)}`),
        "",
        `Source: ${release.url}`,
    ];
    return truncate(platformSafe(lines.join("\n")), MAX_DESCRIPTION_LENGTH);
}

export function formatVideoTitle(track: TrackDescriptor, release: ReleaseMetadata): string {
    const name = sanitizeTrackName(track.name, track.number);
    const title = release.performer && release.performer !== "Unknown"
        ? `${release.performer} - ${name} (${release.date})`
        : `Track ${track.number} - ${name}`;
    return truncate(platformSafe(title), MAX_TITLE_LENGTH);
}

export function formatVideoDescription(track: TrackDescriptor, release: ReleaseMetadata): string {
    const lines = [
        sanitizeTrackName(track.name, track.number),
        `Track ${track.number} of ${release.tracks.length}`,
        "",
        release.performer,
        release.venue,
        release.date,
        "",
        `Source: ${release.url}`,
    ];
    return truncate(platformSafe(lines.join("\n")), MAX_DESCRIPTION_LENGTH);
}
