import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fileSize } from "./artifacts";
import type { CredentialHandle } from "./auth";
import { ArtifactInvalidError, UploadError, UpstreamDataError } from "./errors";
import type { ProgressUpdate } from "./progress";
import { createTestPipeline, makeTempDir, removeDir, testRelease } from "./testUtils";

const credentials: CredentialHandle = { subject: "admin", accessToken: "test-access-token" };

function recorder() {
    const updates: ProgressUpdate[] = [];
    return { updates, onProgress: (update: ProgressUpdate) => updates.push(update) };
}

describe("Pipeline", () => {
    let dir: string;

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("downloads, renders, uploads and assembles a playlist in track order", async () => {
        const { pipeline, uploader, download, ffmpeg } = createTestPipeline(dir);
        const progress = recorder();

        const result = await pipeline.run(testRelease.url, credentials, progress);

        expect(result).toEqual({
            releaseId: "show1",
            playlistId: "pl-1",
            playlistUrl: "https://www.youtube.com/playlist?list=pl-1",
            videoIds: ["vid-1", "vid-2"],
            videoPaths: [join(dir, "show1_video_1.mp4"), join(dir, "show1_video_2.mp4")],
        });
        expect(download.calls.map(c => c.url)).toEqual([
            "https://archive.test/download/show1/t01.mp3",
            "https://archive.test/download/show1/t02.mp3",
        ]);
        expect(ffmpeg.calls.map(c => c.args.slice(3, 6))).toEqual([
            [join(dir, "background.png"), "-i", join(dir, "show1_track_1.mp3")],
            [join(dir, "background.png"), "-i", join(dir, "show1_track_2.mp3")],
        ]);
        expect(uploader.uploads.map(u => u.details)).toEqual([
            { title: "Band - First (1977-05-08)", description: expect.stringContaining("Track 1 of 2"), privacy: "unlisted" },
            { title: "Band - Second (1977-05-08)", description: expect.stringContaining("Track 2 of 2"), privacy: "unlisted" },
        ]);
        expect(uploader.playlists.map(p => p.title)).toEqual(["Band - 1977-05-08 - The Hall"]);
        expect(uploader.playlistItems).toEqual([
            ["pl-1", "vid-1"],
            ["pl-1", "vid-2"],
        ]);
        expect(progress.updates).toEqual([
            { message: "Fetching release metadata...", current: 0, total: 0 },
            { message: "Preparing track 1/2: First", current: 0, total: 5 },
            { message: "Preparing track 2/2: Second", current: 1, total: 5 },
            { message: "Uploading track 1/2: First", current: 2, total: 5 },
            { message: "Uploading track 2/2: Second", current: 3, total: 5 },
            { message: "Creating playlist...", current: 4, total: 5 },
            { message: "Playlist ready", current: 5, total: 5 },
        ]);
    });

    it("reuses valid artifacts from an earlier run", async () => {
        await createTestPipeline(dir).pipeline.run(testRelease.url, credentials, recorder());

        const rerun = createTestPipeline(dir);
        const result = await rerun.pipeline.run(testRelease.url, credentials, recorder());

        expect(rerun.download.calls).toHaveLength(0);
        expect(rerun.ffmpeg.calls).toHaveLength(0);
        expect(result.videoIds).toEqual(["vid-1", "vid-2"]);
    });

    it("aborts when a track keeps failing validation and keeps earlier tracks' videos", async () => {
        const { pipeline, uploader, transcoder, ffmpeg } = createTestPipeline(dir, { brokenRenders: ["show1_video_2"] });

        const result = pipeline.run(testRelease.url, credentials, recorder());

        await expect(result).rejects.toBeInstanceOf(ArtifactInvalidError);
        await expect(result).rejects.toThrow("failed validation: file is too small (9 bytes)");
        expect(ffmpeg.calls).toHaveLength(3);
        expect(uploader.uploads).toHaveLength(0);
        expect(uploader.playlists).toHaveLength(0);

        const firstVideo = join(dir, "show1_video_1.mp4");
        expect(await transcoder.validate(firstVideo, 120)).toEqual({ valid: true });
        expect(await fileSize(join(dir, "show1_video_2.mp4"))).toBeUndefined();
    });

    it("fails without tracks", async () => {
        const { pipeline } = createTestPipeline(dir, { release: { ...testRelease, tracks: [] } });

        await expect(pipeline.run(testRelease.url, credentials, recorder())).rejects.toThrow(
            new UpstreamDataError("No tracks found for show1"),
        );
    });

    it("fails when a track has no audio URL", async () => {
        const tracks = [testRelease.tracks[0], { ...testRelease.tracks[1], url: "" }];
        const { pipeline, download } = createTestPipeline(dir, { release: { ...testRelease, tracks } });

        await expect(pipeline.run(testRelease.url, credentials, recorder())).rejects.toThrow("No audio URL for track 2 of show1");
        expect(download.calls).toHaveLength(0);
    });

    it("stops at the first upload failure without creating a playlist", async () => {
        const { pipeline, uploader } = createTestPipeline(dir);
        uploader.failOnUpload = 2;

        await expect(pipeline.run(testRelease.url, credentials, recorder())).rejects.toBeInstanceOf(UploadError);
        expect(uploader.uploads).toHaveLength(1);
        expect(uploader.playlists).toHaveLength(0);
    });

    it("removes the release's artifacts after upload when asked to", async () => {
        const { pipeline, store } = createTestPipeline(dir, { cleanupAfterUpload: true });

        await pipeline.run(testRelease.url, credentials, recorder());

        expect(await store.findExisting("show1", "audio")).toEqual([]);
        expect(await store.findExisting("show1", "video")).toEqual([]);
    });
});
