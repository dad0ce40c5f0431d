// src/preview.ts
import {
    formatPlaylistDescription,
    formatPlaylistTitle,
    formatVideoDescription,
    formatVideoTitle,
} from "./metadata";
import { sanitizeTrackName } from "./names";
import type { Prober } from "./prober";
import type { Scraper } from "./scraper";

export interface PreviewTrack {
    number: number;
    name: string;
    videoTitle: string;
    durationSeconds: number | null;
    descriptionPreview: string;
    audioFilename: string;
}

export interface ReleasePreview {
    metadata: {
        title: string;
        performer: string;
        venue: string;
        date: string;
        url: string;
        identifier: string;
    };
    playlist: {
        title: string;
        description: string;
        trackCount: number;
    };
    tracks: PreviewTrack[];
    totalDurationSeconds: number;
}

const DESCRIPTION_PREVIEW_LENGTH = 300;

/**
 * Dry run: what a job for this URL would upload. Nothing is downloaded;
 * durations are probed straight from the remote audio URLs.
 */
export async function previewRelease(url: string, scraper: Scraper, prober: Prober): Promise<ReleasePreview> {
    const release = await scraper.extractMetadata(url);

    const tracks: PreviewTrack[] = [];
    let totalDuration = 0;

    for (const track of release.tracks) {
        const duration = await prober.durationOf(track.url);
        totalDuration += duration;

        const description = formatVideoDescription(track, release);
        tracks.push({
            number: track.number,
            name: sanitizeTrackName(track.name, track.number),
            videoTitle: formatVideoTitle(track, release),
            durationSeconds: duration > 0 ? round1(duration) : null,
            descriptionPreview: description.length > DESCRIPTION_PREVIEW_LENGTH
                ? description.slice(0, DESCRIPTION_PREVIEW_LENGTH) + "..."
                : description,
            audioFilename: track.filename,
        });
    }

    return {
        metadata: {
            title: release.title,
            performer: release.performer,
            venue: release.venue,
            date: release.date,
            url: release.url,
            identifier: release.identifier,
        },
        playlist: {
            title: formatPlaylistTitle(release),
            description: formatPlaylistDescription(release),
            trackCount: tracks.length,
        },
        tracks,
        totalDurationSeconds: round1(totalDuration),
    };
}

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}
