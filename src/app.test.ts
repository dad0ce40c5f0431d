import { setImmediate } from "node:timers/promises";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "./app";
import { SessionTokens } from "./auth";
import { InMemoryJobRegistry, type JobResult } from "./jobs";
import type { ReleasePreview } from "./preview";
import { JobRunner, type PipelineRun } from "./runner";
import { FakeUploader } from "./testUtils";

const SECRET = "test-secret-long-enough";

const result: JobResult = {
    releaseId: "show1",
    playlistId: "pl-1",
    playlistUrl: "https://www.youtube.com/playlist?list=pl-1",
    videoIds: ["vid-1", "vid-2"],
    videoPaths: ["/srv/artifacts/show1_video_1.mp4", "/srv/artifacts/show1_video_2.mp4"],
};

const samplePreview: ReleasePreview = {
    metadata: {
        title: "Band Live",
        performer: "Band",
        venue: "The Hall",
        date: "1977-05-08",
        url: "https://archive.org/details/show1",
        identifier: "show1",
    },
    playlist: { title: "Band - 1977-05-08 - The Hall", description: "Band Live", trackCount: 0 },
    tracks: [],
    totalDurationSeconds: 0,
};

function setup(preview: (url: string) => Promise<ReleasePreview> = async () => samplePreview) {
    const finish: ((r: JobResult) => void)[] = [];
    const pipeline: PipelineRun = { run: () => new Promise<JobResult>(resolve => finish.push(resolve)) };
    const tokens = new SessionTokens(SECRET);
    const runner = new JobRunner(new InMemoryJobRegistry(), pipeline, new FakeUploader());
    const app = createApp({ runner, tokens, preview });
    return { app, runner, tokens, finish };
}

async function bearer(tokens: SessionTokens) {
    const token = await tokens.issueToken({ sub: "admin", platformToken: "test-access-token" });
    return { Authorization: `Bearer ${token}`, "Content-Type": "application/json" };
}

describe("HTTP API", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("answers health checks without a token", async () => {
        const { app } = setup();
        const res = await app.request("/health");

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ ok: true });
    });

    it("rejects requests without a valid bearer token", async () => {
        const { app } = setup();

        const missing = await app.request("/api/jobs");
        expect(missing.status).toBe(401);
        expect(await missing.json()).toEqual({ error: "Missing or invalid Authorization header" });

        const forged = await app.request("/api/jobs", { headers: { Authorization: "Bearer not-a-jwt" } });
        expect(forged.status).toBe(401);
        expect(await forged.json()).toEqual({ error: "Invalid token" });
    });

    it("accepts a release and reports its status", async () => {
        const { app, runner, tokens } = setup();
        const headers = await bearer(tokens);

        const submitted = await app.request("/api/jobs", {
            method: "POST",
            headers,
            body: JSON.stringify({ url: "https://archive.org/details/show1" }),
        });
        expect(submitted.status).toBe(202);
        const jobId = runner.list()[0].id;
        expect(await submitted.json()).toEqual({ jobId, status: "pending" });

        await setImmediate();
        const running = { jobId, status: "running", progress: { message: "Starting...", current: 0, total: 0 } };
        const polled = await app.request(`/api/jobs/${jobId}`, { headers });
        expect(await polled.json()).toEqual(running);

        const listed = await app.request("/api/jobs", { headers });
        expect(await listed.json()).toEqual([running]);
    });

    it("rejects bad submissions with 400", async () => {
        const { app, tokens } = setup();
        const headers = await bearer(tokens);

        const badUrl = await app.request("/api/jobs", {
            method: "POST",
            headers,
            body: JSON.stringify({ url: "https://example.com/details/show1" }),
        });
        expect(badUrl.status).toBe(400);
        expect(await badUrl.json()).toEqual({ error: "Invalid archive.org URL" });

        const notJson = await app.request("/api/jobs", { method: "POST", headers, body: "url=x" });
        expect(notJson.status).toBe(400);
        expect(await notJson.json()).toEqual({ error: "Request body must be JSON" });

        const noUrl = await app.request("/api/jobs", { method: "POST", headers, body: JSON.stringify({ url: "" }) });
        expect(await noUrl.json()).toEqual({ error: "URL is required" });
    });

    it("returns 404 for unknown jobs", async () => {
        const { app, tokens } = setup();
        const res = await app.request("/api/jobs/nope", { headers: await bearer(tokens) });

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: "Job nope not found" });
    });

    it("publishes only completed jobs", async () => {
        const { app, runner, tokens, finish } = setup();
        const headers = await bearer(tokens);
        const job = runner.submit("https://archive.org/details/show1", { subject: "admin", accessToken: "test-access-token" });

        const early = await app.request(`/api/jobs/${job.id}/publish`, { method: "POST", headers });
        expect(early.status).toBe(409);
        expect(await early.json()).toEqual({ error: "Job not complete yet" });

        await setImmediate();
        finish[0](result);
        await runner.settled(job.id);

        const published = await app.request(`/api/jobs/${job.id}/publish`, { method: "POST", headers });
        expect(published.status).toBe(200);
        expect(await published.json()).toEqual({
            ok: true,
            videosMadePublic: 2,
            playlistUpdated: true,
            playlistUrl: "https://www.youtube.com/playlist?list=pl-1",
        });

        const polled = await app.request(`/api/jobs/${job.id}`, { headers });
        expect(await polled.json()).toEqual({
            jobId: job.id,
            status: "complete",
            progress: { message: "Complete!", current: 0, total: 0 },
            result: {
                releaseId: "show1",
                playlistId: "pl-1",
                playlistUrl: "https://www.youtube.com/playlist?list=pl-1",
                videoIds: ["vid-1", "vid-2"],
            },
        });
    });

    it("previews a release", async () => {
        const preview = vi.fn(async () => samplePreview);
        const { app, tokens } = setup(preview);

        const res = await app.request("/api/preview", {
            method: "POST",
            headers: await bearer(tokens),
            body: JSON.stringify({ url: "https://archive.org/details/show1" }),
        });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual(samplePreview);
        expect(preview).toHaveBeenCalledWith("https://archive.org/details/show1");
    });

    it("hides unexpected errors behind a 500", async () => {
        const { app, tokens } = setup(async () => {
            throw new Error("socket hang up");
        });

        const res = await app.request("/api/preview", {
            method: "POST",
            headers: await bearer(tokens),
            body: JSON.stringify({ url: "https://archive.org/details/show1" }),
        });

        expect(res.status).toBe(500);
        expect(await res.json()).toEqual({ error: "Internal server error" });
    });
});
