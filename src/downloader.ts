// src/downloader.ts
import { createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fileSize, type ArtifactCheck } from "./artifacts";
import { DownloadError } from "./errors";

export interface DownloaderOptions {
    /** Longest wait for the response headers or between two chunks of the body. */
    timeoutMs: number;
    fetch?: typeof fetch;
}

/** Suffix of the in-progress file a download writes before it is renamed into place. */
export const PARTIAL_SUFFIX = ".part";

export class AudioDownloader {
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: DownloaderOptions) {
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetch ?? fetch;
    }

    /**
     * Streams `url` to `target`. The body goes to `target.part` first and is
     * renamed on success, so a crash mid-download never leaves a file at
     * `target` that looks complete. The timeout applies to silence, not to
     * the whole transfer: a slow but steady download keeps going.
     */
    async download(url: string, target: string) {
        const partial = target + PARTIAL_SUFFIX;
        const controller = new AbortController();
        let timer = setTimeout(() => controller.abort(), this.timeoutMs);
        const touch = () => {
            clearTimeout(timer);
            timer = setTimeout(() => controller.abort(), this.timeoutMs);
        };

        console.log(`[Download] Fetching ${url}...`);

        try {
            const response = await this.fetchImpl(url, { signal: controller.signal });
            if (!response.ok) {
                throw new DownloadError(`Failed to download ${url}: ${response.status} ${response.statusText}`);
            }
            if (!response.body) {
                throw new DownloadError(`Failed to download ${url}: response has no body`);
            }

            let bytes = 0;
            touch();
            await pipeline(
                Readable.fromWeb(response.body),
                new Transform({
                    transform(chunk: Buffer, _encoding, callback) {
                        touch();
                        bytes += chunk.length;
                        callback(null, chunk);
                    },
                }),
                createWriteStream(partial),
                { signal: controller.signal },
            );
            await rename(partial, target);
            console.log(`[Download] Saved ${bytes} bytes to ${target}`);
        } catch (error) {
            await rm(partial, { force: true });
            if (error instanceof DownloadError) throw error;
            const reason = controller.signal.aborted
                ? `no data received for ${this.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            throw new DownloadError(`Failed to download ${url}: ${reason}`, { cause: error });
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * A cached audio file counts as complete when it is non-empty and no
     * in-progress file sits next to it. Its contents are not probed here;
     * the rendered video is validated instead.
     */
    async validate(target: string): Promise<ArtifactCheck> {
        const size = await fileSize(target);
        if (size === undefined) {
            return { valid: false, reason: "file is missing" };
        }
        if (size === 0) {
            return { valid: false, reason: "file is empty" };
        }
        if ((await fileSize(target + PARTIAL_SUFFIX)) !== undefined) {
            return { valid: false, reason: "download still in progress" };
        }
        return { valid: true };
    }
}
