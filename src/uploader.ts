// src/uploader.ts
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CredentialHandle } from "./auth";
import { UploadError } from "./errors";

export type Privacy = "private" | "unlisted" | "public";

export interface VideoDetails {
    title: string;
    description: string;
    privacy: Privacy;
}

/**
 * Video platform operations the pipeline relies on. Implementations own the
 * wire protocol; the pipeline only sees ids.
 */
export interface Uploader {
    uploadVideo(credentials: CredentialHandle, videoPath: string, details: VideoDetails): Promise<string>;
    createPlaylist(credentials: CredentialHandle, details: VideoDetails): Promise<string>;
    addToPlaylist(credentials: CredentialHandle, playlistId: string, videoId: string): Promise<void>;
    /** Returns how many of the videos were switched to public. */
    setVideosPublic(credentials: CredentialHandle, videoIds: string[]): Promise<number>;
    setPlaylistPublic(credentials: CredentialHandle, playlistId: string): Promise<boolean>;
    playlistUrl(playlistId: string): string;
}

export interface YouTubeUploaderOptions {
    apiBaseUrl?: string;     // default https://www.googleapis.com
    uploadBaseUrl?: string;  // default https://www.googleapis.com/upload
    fetch?: typeof fetch;
}

const resourceSchema = z.object({ id: z.string().min(1) }).passthrough();

// "Music" category
const MUSIC_CATEGORY_ID = "10";

export class YouTubeUploader implements Uploader {
    private readonly apiBaseUrl: string;
    private readonly uploadBaseUrl: string;
    private readonly fetchImpl: typeof fetch;

    constructor(options: YouTubeUploaderOptions = {}) {
        this.apiBaseUrl = (options.apiBaseUrl ?? "https://www.googleapis.com").replace(/\/+$/, "");
        this.uploadBaseUrl = (options.uploadBaseUrl ?? "https://www.googleapis.com/upload").replace(/\/+$/, "");
        this.fetchImpl = options.fetch ?? fetch;
    }

    async uploadVideo(credentials: CredentialHandle, videoPath: string, details: VideoDetails): Promise<string> {
        const data = await readFile(videoPath);
        console.log(`[Uploader] Uploading ${videoPath} (${(data.byteLength / (1024 * 1024)).toFixed(2)} MB)...`);

        // Resumable upload: open a session, then send the whole file to it
        const session = await this.request(`${this.uploadBaseUrl}/youtube/v3/videos?uploadType=resumable&part=snippet,status`, {
            method: "POST",
            headers: {
                ...this.headers(credentials),
                "Content-Type": "application/json; charset=UTF-8",
                "X-Upload-Content-Type": "video/*",
                "X-Upload-Content-Length": String(data.byteLength),
            },
            body: JSON.stringify({
                snippet: { title: details.title, description: details.description, categoryId: MUSIC_CATEGORY_ID },
                status: { privacyStatus: details.privacy, selfDeclaredMadeForKids: false },
            }),
        });

        const location = session.headers.get("location");
        if (!location) {
            throw new UploadError("Upload session did not return a location");
        }

        const response = await this.request(location, {
            method: "PUT",
            headers: { ...this.headers(credentials), "Content-Type": "video/*" },
            body: data,
        });
        const { id } = await this.parseResource(response);
        console.log(`[Uploader] Uploaded video ${id}`);
        return id;
    }

    async createPlaylist(credentials: CredentialHandle, details: VideoDetails): Promise<string> {
        const response = await this.request(`${this.apiBaseUrl}/youtube/v3/playlists?part=snippet,status`, {
            method: "POST",
            headers: { ...this.headers(credentials), "Content-Type": "application/json" },
            body: JSON.stringify({
                snippet: { title: details.title, description: details.description },
                status: { privacyStatus: details.privacy },
            }),
        });
        const { id } = await this.parseResource(response);
        return id;
    }

    async addToPlaylist(credentials: CredentialHandle, playlistId: string, videoId: string) {
        await this.request(`${this.apiBaseUrl}/youtube/v3/playlistItems?part=snippet`, {
            method: "POST",
            headers: { ...this.headers(credentials), "Content-Type": "application/json" },
            body: JSON.stringify({
                snippet: { playlistId, resourceId: { kind: "youtube#video", videoId } },
            }),
        });
    }

    async setVideosPublic(credentials: CredentialHandle, videoIds: string[]): Promise<number> {
        let updated = 0;
        for (const id of videoIds) {
            try {
                await this.setPrivacy(credentials, "videos", id);
                updated++;
            } catch (error) {
                console.warn(`[Uploader] Could not make video ${id} public:`, error instanceof Error ? error.message : error);
            }
        }
        return updated;
    }

    async setPlaylistPublic(credentials: CredentialHandle, playlistId: string): Promise<boolean> {
        try {
            await this.setPrivacy(credentials, "playlists", playlistId);
            return true;
        } catch (error) {
            console.warn(`[Uploader] Could not make playlist ${playlistId} public:`, error instanceof Error ? error.message : error);
            return false;
        }
    }

    playlistUrl(playlistId: string): string {
        return `https://www.youtube.com/playlist?list=${encodeURIComponent(playlistId)}`;
    }

    private async setPrivacy(credentials: CredentialHandle, resource: "videos" | "playlists", id: string) {
        await this.request(`${this.apiBaseUrl}/youtube/v3/${resource}?part=status`, {
            method: "PUT",
            headers: { ...this.headers(credentials), "Content-Type": "application/json" },
            body: JSON.stringify({ id, status: { privacyStatus: "public" } }),
        });
    }

    private headers(credentials: CredentialHandle): Record<string, string> {
        return { Authorization: `Bearer ${credentials.accessToken}` };
    }

    private async request(url: string, init: RequestInit): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, init);
        } catch (error) {
            throw new UploadError(`Request to ${new URL(url).pathname} failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
                cause: error,
            });
        }

        if (!response.ok) {
            const detail = (await response.text()).slice(0, 500);
            throw new UploadError(`Platform API ${new URL(url).pathname} returned ${response.status}: ${detail}`, response.status);
        }
        return response;
    }

    private async parseResource(response: Response): Promise<{ id: string }> {
        const parsed = resourceSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new UploadError("Platform API response did not include an id");
        }
        return parsed.data;
    }
}
