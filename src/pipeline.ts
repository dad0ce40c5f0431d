// src/pipeline.ts
import { extname } from "node:path";
import type { ArtifactStore } from "./artifacts";
import type { CredentialHandle } from "./auth";
import type { AudioDownloader } from "./downloader";
import { UpstreamDataError } from "./errors";
import type { JobResult } from "./jobs";
import {
    formatPlaylistDescription,
    formatPlaylistTitle,
    formatVideoDescription,
    formatVideoTitle,
} from "./metadata";
import { sanitizeTrackName } from "./names";
import type { Prober } from "./prober";
import type { ProgressObserver } from "./progress";
import type { ReleaseMetadata, Scraper, TrackDescriptor } from "./scraper";
import type { Transcoder } from "./transcoder";
import type { Privacy, Uploader } from "./uploader";

export interface PipelineDeps {
    scraper: Scraper;
    downloader: AudioDownloader;
    store: ArtifactStore;
    prober: Prober;
    transcoder: Transcoder;
    uploader: Uploader;
    backgroundImage: string;
    privacy?: Exclude<Privacy, "public">;
    cleanupAfterUpload?: boolean;
}

interface PreparedTrack {
    track: TrackDescriptor;
    videoPath: string;
}

/**
 * scrape → (download, render) per track → upload each → playlist.
 * Tracks run strictly in order and any failure aborts the whole run; the
 * artifact cache is what makes a rerun cheap.
 */
export class Pipeline {
    constructor(private readonly deps: PipelineDeps) {}

    async run(sourceUrl: string, credentials: CredentialHandle, observer: ProgressObserver): Promise<JobResult> {
        const { scraper, uploader, store } = this.deps;
        const privacy = this.deps.privacy ?? "unlisted";

        observer.onProgress({ message: "Fetching release metadata...", current: 0, total: 0 });
        const release = await scraper.extractMetadata(sourceUrl);
        if (release.tracks.length === 0) {
            throw new UpstreamDataError(`No tracks found for ${release.identifier}`);
        }
        const missingAudio = release.tracks.find(t => !t.url);
        if (missingAudio) {
            throw new UpstreamDataError(`No audio URL for track ${missingAudio.number} of ${release.identifier}`);
        }

        const tracks = [...release.tracks].sort((a, b) => a.number - b.number);
        const total = tracks.length * 2 + 1;
        let current = 0;

        const prepared: PreparedTrack[] = [];
        for (const track of tracks) {
            const name = sanitizeTrackName(track.name, track.number);
            observer.onProgress({ message: `Preparing track ${track.number}/${tracks.length}: ${name}`, current, total });
            prepared.push({ track, videoPath: await this.prepareTrack(release, track) });
            current++;
        }

        const videoIds: string[] = [];
        for (const { track, videoPath } of prepared) {
            const name = sanitizeTrackName(track.name, track.number);
            observer.onProgress({ message: `Uploading track ${track.number}/${tracks.length}: ${name}`, current, total });
            const videoId = await uploader.uploadVideo(credentials, videoPath, {
                title: formatVideoTitle(track, release),
                description: formatVideoDescription(track, release),
                privacy,
            });
            videoIds.push(videoId);
            current++;
        }

        observer.onProgress({ message: "Creating playlist...", current, total });
        const playlistId = await uploader.createPlaylist(credentials, {
            title: formatPlaylistTitle(release),
            description: formatPlaylistDescription(release),
            privacy,
        });
        for (const videoId of videoIds) {
            await uploader.addToPlaylist(credentials, playlistId, videoId);
        }
        current++;
        observer.onProgress({ message: "Playlist ready", current, total });

        if (this.deps.cleanupAfterUpload) {
            await store.cleanupRelease(release.identifier);
        }

        return {
            releaseId: release.identifier,
            playlistId,
            playlistUrl: uploader.playlistUrl(playlistId),
            videoIds,
            videoPaths: prepared.map(p => p.videoPath),
        };
    }

    private async prepareTrack(release: ReleaseMetadata, track: TrackDescriptor): Promise<string> {
        const { downloader, store, prober, transcoder } = this.deps;

        const audioPath = store.pathFor({
            releaseId: release.identifier,
            trackNumber: track.number,
            kind: "audio",
            extension: extname(track.filename),
        });
        await store.resolveOrCreate(
            audioPath,
            target => downloader.download(track.url, target),
            target => downloader.validate(target),
        );

        const duration = await prober.durationOf(audioPath);
        const videoPath = store.pathFor({ releaseId: release.identifier, trackNumber: track.number, kind: "video" });
        return transcoder.render(audioPath, this.deps.backgroundImage, videoPath, duration || undefined);
    }
}
