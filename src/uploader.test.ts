import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CredentialHandle } from "./auth";
import { UploadError } from "./errors";
import { fakeFetch, jsonResponse, makeTempDir, removeDir } from "./testUtils";
import { YouTubeUploader } from "./uploader";

const credentials: CredentialHandle = { subject: "admin", accessToken: "test-access-token" };

describe("YouTubeUploader", () => {
    let dir: string;

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it("uploads a video through a resumable session", async () => {
        const video = join(dir, "v.mp4");
        await writeFile(video, "video-bytes");
        const fetch = fakeFetch(url =>
            url.includes("uploadType=resumable")
                ? new Response(null, { status: 200, headers: { Location: "https://upload.test/session/1" } })
                : jsonResponse({ id: "vid-1" }),
        );
        const uploader = new YouTubeUploader({ uploadBaseUrl: "https://upload.test", fetch });

        const id = await uploader.uploadVideo(credentials, video, { title: "T", description: "D", privacy: "unlisted" });

        expect(id).toBe("vid-1");
        expect(fetch.calls.map(c => [c.init?.method, c.url])).toEqual([
            ["POST", "https://upload.test/youtube/v3/videos?uploadType=resumable&part=snippet,status"],
            ["PUT", "https://upload.test/session/1"],
        ]);
        expect(JSON.parse(String(fetch.calls[0].init?.body))).toEqual({
            snippet: { title: "T", description: "D", categoryId: "10" },
            status: { privacyStatus: "unlisted", selfDeclaredMadeForKids: false },
        });
        expect(fetch.calls[0].init?.headers).toMatchObject({
            Authorization: "Bearer test-access-token",
            "X-Upload-Content-Length": "11",
        });
    });

    it("creates a playlist and adds videos to it", async () => {
        const fetch = fakeFetch(url => (url.includes("/playlists") ? jsonResponse({ id: "pl-1" }) : jsonResponse({ id: "item" })));
        const uploader = new YouTubeUploader({ apiBaseUrl: "https://api.test", fetch });

        const playlistId = await uploader.createPlaylist(credentials, { title: "P", description: "", privacy: "private" });
        await uploader.addToPlaylist(credentials, playlistId, "vid-1");

        expect(playlistId).toBe("pl-1");
        expect(fetch.calls[1].url).toBe("https://api.test/youtube/v3/playlistItems?part=snippet");
        expect(JSON.parse(String(fetch.calls[1].init?.body))).toEqual({
            snippet: { playlistId: "pl-1", resourceId: { kind: "youtube#video", videoId: "vid-1" } },
        });
        expect(uploader.playlistUrl("pl-1")).toBe("https://www.youtube.com/playlist?list=pl-1");
    });

    it("turns API errors into UploadError with the status", async () => {
        const fetch = fakeFetch(() => new Response("quotaExceeded", { status: 403 }));
        const uploader = new YouTubeUploader({ apiBaseUrl: "https://api.test", fetch });

        const result = uploader.createPlaylist(credentials, { title: "P", description: "", privacy: "private" });

        await expect(result).rejects.toBeInstanceOf(UploadError);
        await expect(result).rejects.toMatchObject({
            status: 403,
            message: "Platform API /youtube/v3/playlists returned 403: quotaExceeded",
        });
    });

    it("counts the videos it managed to make public", async () => {
        const fetch = fakeFetch((_url, init) => {
            const body = JSON.parse(String(init?.body));
            return body.id === "bad" ? new Response("nope", { status: 404 }) : jsonResponse({ id: body.id });
        });
        const uploader = new YouTubeUploader({ apiBaseUrl: "https://api.test", fetch });

        expect(await uploader.setVideosPublic(credentials, ["a", "bad", "c"])).toBe(2);
        expect(await uploader.setPlaylistPublic(credentials, "pl-1")).toBe(true);
        expect(await uploader.setPlaylistPublic(credentials, "bad")).toBe(false);
        expect(fetch.calls[0]).toMatchObject({ url: "https://api.test/youtube/v3/videos?part=status", init: { method: "PUT" } });
    });
});
