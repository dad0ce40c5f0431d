// src/config.ts
import { z } from "zod";
import { ConfigError } from "./errors";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform(value => value === "true" || value === "1");

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8080),
    JWT_SECRET: z.string().min(16, "must be at least 16 characters"),
    WEBHOOK_SECRET: z.string().min(1).optional(),
    ARTIFACT_DIR: z.string().min(1).default("temp"),
    BACKGROUND_IMAGE: z.string().min(1).default("assets/background.png"),
    FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
    FFPROBE_PATH: z.string().min(1).default("ffprobe"),
    PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    ENCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(3_600_000),
    DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    AUDIO_BITRATE: z.string().regex(/^\d+k$/, "must look like 192k").default("192k"),
    UPLOAD_PRIVACY: z.enum(["private", "unlisted"]).default("unlisted"),
    CLEANUP_AFTER_UPLOAD: booleanFlag,
    ARCHIVE_BASE_URL: z.string().url().default("https://archive.org"),
    PLATFORM_API_BASE_URL: z.string().url().default("https://www.googleapis.com"),
    PLATFORM_UPLOAD_BASE_URL: z.string().url().default("https://www.googleapis.com/upload"),
    PLATFORM_ACCESS_TOKEN: z.string().min(1).optional(),
});

export interface AppConfig {
    port: number;
    jwtSecret: string;
    webhookSecret: string;
    artifactDir: string;
    backgroundImage: string;
    ffmpegPath: string;
    ffprobePath: string;
    probeTimeoutMs: number;
    encodeTimeoutMs: number;
    downloadTimeoutMs: number;
    audioBitrate: string;
    uploadPrivacy: "private" | "unlisted";
    cleanupAfterUpload: boolean;
    archiveBaseUrl: string;
    platformApiBaseUrl: string;
    platformUploadBaseUrl: string;
    platformAccessToken?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
    }

    const e = parsed.data;
    return {
        port: e.PORT,
        jwtSecret: e.JWT_SECRET,
        webhookSecret: e.WEBHOOK_SECRET ?? e.JWT_SECRET,
        artifactDir: e.ARTIFACT_DIR,
        backgroundImage: e.BACKGROUND_IMAGE,
        ffmpegPath: e.FFMPEG_PATH,
        ffprobePath: e.FFPROBE_PATH,
        probeTimeoutMs: e.PROBE_TIMEOUT_MS,
        encodeTimeoutMs: e.ENCODE_TIMEOUT_MS,
        downloadTimeoutMs: e.DOWNLOAD_TIMEOUT_MS,
        audioBitrate: e.AUDIO_BITRATE,
        uploadPrivacy: e.UPLOAD_PRIVACY,
        cleanupAfterUpload: e.CLEANUP_AFTER_UPLOAD,
        archiveBaseUrl: e.ARCHIVE_BASE_URL,
        platformApiBaseUrl: e.PLATFORM_API_BASE_URL,
        platformUploadBaseUrl: e.PLATFORM_UPLOAD_BASE_URL,
        platformAccessToken: e.PLATFORM_ACCESS_TOKEN,
    };
}
