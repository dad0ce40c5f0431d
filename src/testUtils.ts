// src/testUtils.ts
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArtifactStore } from "./artifacts";
import type { CredentialHandle } from "./auth";
import { AudioDownloader } from "./downloader";
import { UploadError } from "./errors";
import { Pipeline } from "./pipeline";
import { Prober } from "./prober";
import type { ProcessResult, ProcessRunner } from "./process";
import type { ReleaseMetadata, Scraper } from "./scraper";
import { Transcoder } from "./transcoder";
import type { Uploader, VideoDetails } from "./uploader";

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), "pipeline-test-"));
}

export async function removeDir(dir: string) {
    await rm(dir, { recursive: true, force: true });
}

export function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
    return { code: 0, stdout: "", stderr: "", timedOut: false, ...overrides };
}

/** stdout of `ffprobe -of json` for a file with the given duration and stream types. */
export function ffprobeJson(duration: number | string | undefined, streams: string[]): string {
    return JSON.stringify({
        format: duration === undefined ? {} : { duration: String(duration) },
        streams: streams.map(codec_type => ({ codec_type })),
    });
}

export interface RecordedCall {
    command: string;
    args: string[];
    timeoutMs: number;
}

export function scriptedRunner(handler: (command: string, args: string[]) => ProcessResult | Promise<ProcessResult>) {
    const calls: RecordedCall[] = [];
    const run: ProcessRunner = async (command, args, options) => {
        calls.push({ command, args, timeoutMs: options.timeoutMs });
        return handler(command, args);
    };
    return Object.assign(run, { calls });
}

export interface FetchCall {
    url: string;
    init?: RequestInit;
}

export function fakeFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
    const calls: FetchCall[] = [];
    const impl: typeof fetch = async (input, init) => {
        const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
        calls.push({ url, init });
        return handler(url, init);
    };
    return Object.assign(impl, { calls });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json", ...headers },
    });
}

export const VALID_VIDEO_BYTES = "v".repeat(2048);

export interface TestHarnessOptions {
    /** Output paths containing any of these strings get a truncated render. */
    brokenRenders?: string[];
    cleanupAfterUpload?: boolean;
    release?: ReleaseMetadata;
}

export class FakeUploader implements Uploader {
    readonly uploads: { path: string; details: VideoDetails }[] = [];
    readonly playlists: VideoDetails[] = [];
    readonly playlistItems: [string, string][] = [];
    readonly madePublic: string[] = [];
    failOnUpload?: number;

    async uploadVideo(_credentials: CredentialHandle, videoPath: string, details: VideoDetails): Promise<string> {
        if (this.uploads.length + 1 === this.failOnUpload) {
            throw new UploadError("Platform API /youtube/v3/videos returned 403: quotaExceeded", 403);
        }
        this.uploads.push({ path: videoPath, details });
        return `vid-${this.uploads.length}`;
    }

    async createPlaylist(_credentials: CredentialHandle, details: VideoDetails): Promise<string> {
        this.playlists.push(details);
        return `pl-${this.playlists.length}`;
    }

    async addToPlaylist(_credentials: CredentialHandle, playlistId: string, videoId: string) {
        this.playlistItems.push([playlistId, videoId]);
    }

    async setVideosPublic(_credentials: CredentialHandle, videoIds: string[]): Promise<number> {
        this.madePublic.push(...videoIds);
        return videoIds.length;
    }

    async setPlaylistPublic(_credentials: CredentialHandle, playlistId: string): Promise<boolean> {
        this.madePublic.push(playlistId);
        return true;
    }

    playlistUrl(playlistId: string): string {
        return `https://www.youtube.com/playlist?list=${playlistId}`;
    }
}

export const testRelease: ReleaseMetadata = {
    identifier: "show1",
    title: "Band Live at The Hall",
    performer: "Band",
    venue: "The Hall",
    date: "1977-05-08",
    url: "https://archive.org/details/show1",
    tracks: [
        { number: 1, name: "First", url: "https://archive.test/download/show1/t01.mp3", filename: "t01.mp3" },
        { number: 2, name: "Second", url: "https://archive.test/download/show1/t02.mp3", filename: "t02.mp3" },
    ],
};

/**
 * A Pipeline over a real artifact directory with scripted ffmpeg/ffprobe,
 * a fake audio host and a fake uploader.
 */
export function createTestPipeline(dir: string, options: TestHarnessOptions = {}) {
    const release = options.release ?? testRelease;
    const store = new ArtifactStore(dir);
    const download = fakeFetch(() => new Response("audio-bytes"));
    const ffprobe = scriptedRunner((_command, args) => {
        const input = args[args.length - 1];
        return processResult({
            stdout: input.endsWith(".mp4") ? ffprobeJson(120.5, ["video", "audio"]) : ffprobeJson(120, ["audio"]),
        });
    });
    const ffmpeg = scriptedRunner(async (_command, args) => {
        const output = args[args.length - 1];
        const broken = (options.brokenRenders ?? []).some(part => output.includes(part));
        await writeFile(output, broken ? "truncated" : VALID_VIDEO_BYTES);
        return processResult();
    });
    const prober = new Prober({ ffprobePath: "ffprobe", timeoutMs: 1000, run: ffprobe });
    const transcoder = new Transcoder(store, prober, { ffmpegPath: "ffmpeg", timeoutMs: 1000, run: ffmpeg });
    const uploader = new FakeUploader();
    const scraper: Scraper = { extractMetadata: async () => release };

    const pipeline = new Pipeline({
        scraper,
        downloader: new AudioDownloader({ timeoutMs: 1000, fetch: download }),
        store,
        prober,
        transcoder,
        uploader,
        backgroundImage: join(dir, "background.png"),
        cleanupAfterUpload: options.cleanupAfterUpload,
    });

    return { pipeline, store, transcoder, uploader, download, ffmpeg, ffprobe };
}
