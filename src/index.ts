// src/index.ts
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { ArtifactStore } from "./artifacts";
import { SessionTokens } from "./auth";
import { loadConfig } from "./config";
import { AudioDownloader } from "./downloader";
import { InMemoryJobRegistry } from "./jobs";
import { Pipeline } from "./pipeline";
import { previewRelease } from "./preview";
import { Prober } from "./prober";
import { JobRunner } from "./runner";
import { ArchiveScraper } from "./scraper";
import { Transcoder } from "./transcoder";
import { YouTubeUploader } from "./uploader";
import { WebhookNotifier } from "./webhooks";

const config = loadConfig();

const store = new ArtifactStore(config.artifactDir);
await store.init();

const prober = new Prober({ ffprobePath: config.ffprobePath, timeoutMs: config.probeTimeoutMs });
const transcoder = new Transcoder(store, prober, {
    ffmpegPath: config.ffmpegPath,
    timeoutMs: config.encodeTimeoutMs,
    audioBitrate: config.audioBitrate,
});
const scraper = new ArchiveScraper({ baseUrl: config.archiveBaseUrl, timeoutMs: config.downloadTimeoutMs });
const uploader = new YouTubeUploader({
    apiBaseUrl: config.platformApiBaseUrl,
    uploadBaseUrl: config.platformUploadBaseUrl,
});

if (!(await transcoder.checkAvailable())) {
    console.warn("[Startup] ffmpeg is not available; jobs will fail until it is installed");
}

const pipeline = new Pipeline({
    scraper,
    downloader: new AudioDownloader({ timeoutMs: config.downloadTimeoutMs }),
    store,
    prober,
    transcoder,
    uploader,
    backgroundImage: config.backgroundImage,
    privacy: config.uploadPrivacy,
    cleanupAfterUpload: config.cleanupAfterUpload,
});

const tokens = new SessionTokens(config.jwtSecret);
const runner = new JobRunner(new InMemoryJobRegistry(), pipeline, uploader, new WebhookNotifier(config.webhookSecret));

const app = createApp({
    runner,
    tokens,
    preview: url => previewRelease(url, scraper, prober),
});

// --- Print a session token for the configured platform account ---
if (config.platformAccessToken) {
    const startupToken = await tokens.issueToken({ sub: "admin", platformToken: config.platformAccessToken });
    console.log("\n" + "=".repeat(80));
    console.log("Archive playlist pipeline - Session Token");
    console.log("=".repeat(80));
    console.log("\nYour session token:");
    console.log("\n  " + startupToken);
    console.log("\nUse this in API requests:");
    console.log("  Authorization: Bearer " + startupToken);
    console.log("\n" + "=".repeat(80) + "\n");
}

serve({ fetch: app.fetch, port: config.port }, info => {
    console.log(`Listening on http://localhost:${info.port}`);
});
