// src/artifacts.ts
import { mkdir, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { ArtifactInvalidError } from "./errors";

export type ArtifactKind = "audio" | "video";

export interface ArtifactKey {
    releaseId: string;
    trackNumber: number;
    kind: ArtifactKind;
    extension?: string;
}

export type ArtifactCheck = { valid: true } | { valid: false; reason: string };

/** Writes the artifact at the given path. */
export type Producer = (target: string) => Promise<void>;
export type Validator = (target: string) => Promise<ArtifactCheck>;

export interface ArtifactStoreOptions {
    /** Productions attempted before giving up on an artifact that keeps failing validation. */
    maxAttempts?: number;
}

/**
 * Deterministic file name for an artifact: `{release}_track_{n}[.ext]` for
 * audio and `{release}_video_{n}.{ext}` for video.
 */
export function artifactName(key: ArtifactKey): string {
    const release = safeSegment(key.releaseId);
    const ext = key.extension ? `.${safeSegment(key.extension.replace(/^\.+/, ""))}` : "";
    if (key.kind === "audio") {
        return `${release}_track_${key.trackNumber}${ext}`;
    }
    return `${release}_video_${key.trackNumber}${ext || ".mp4"}`;
}

function safeSegment(value: string): string {
    return value.replace(/[^A-Za-z0-9._-]/g, "_");
}

export async function fileSize(path: string): Promise<number | undefined> {
    try {
        const info = await stat(path);
        return info.isFile() ? info.size : undefined;
    } catch (error) {
        if (isNotFound(error)) return undefined;
        throw error;
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Filesystem cache of pipeline artifacts. Anything already on disk that
 * passes its validator is reused, which is what lets a resubmitted job pick
 * up where a crashed one stopped.
 */
export class ArtifactStore {
    readonly dir: string;
    private readonly maxAttempts: number;
    private readonly inFlight = new Map<string, Promise<string>>();

    constructor(dir: string, options: ArtifactStoreOptions = {}) {
        this.dir = dir;
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    }

    async init() {
        await mkdir(this.dir, { recursive: true });
    }

    pathFor(key: ArtifactKey): string {
        return join(this.dir, artifactName(key));
    }

    /**
     * Returns `target` once it holds a valid artifact, producing it if needed.
     * Concurrent calls for the same target share a single production.
     */
    resolveOrCreate(target: string, producer: Producer, validator: Validator): Promise<string> {
        const pending = this.inFlight.get(target);
        if (pending) {
            console.log(`[Artifacts] Waiting on in-flight production of ${target}`);
            return pending;
        }

        const task = this.produceIfInvalid(target, producer, validator).finally(() => {
            this.inFlight.delete(target);
        });
        this.inFlight.set(target, task);
        return task;
    }

    private async produceIfInvalid(target: string, producer: Producer, validator: Validator): Promise<string> {
        await this.init();

        // an invalid file already on disk counts as the first failed attempt
        let attempts = this.maxAttempts;
        if ((await fileSize(target)) !== undefined) {
            const check = await validator(target);
            if (check.valid) {
                console.log(`[Artifacts] Reusing valid artifact ${target}`);
                return target;
            }
            console.warn(`[Artifacts] Existing artifact ${target} is invalid (${check.reason}), regenerating`);
            await this.remove(target);
            attempts = Math.max(1, attempts - 1);
        }

        let reason = "not produced";
        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                await producer(target);
            } catch (error) {
                await this.remove(target);
                throw error;
            }

            const check = await validator(target);
            if (check.valid) {
                return target;
            }

            reason = check.reason;
            await this.remove(target);
            console.warn(`[Artifacts] Produced artifact ${target} is invalid (${reason}), attempt ${attempt}/${attempts}`);
        }

        throw new ArtifactInvalidError(target, reason);
    }

    async remove(path: string) {
        await rm(path, { force: true });
    }

    /** Artifacts of one kind already on disk for a release, sorted by track number. */
    async findExisting(releaseId: string, kind: ArtifactKind): Promise<string[]> {
        const prefix = `${safeSegment(releaseId)}_${kind === "audio" ? "track" : "video"}_`;
        let entries: string[];
        try {
            entries = await readdir(this.dir);
        } catch (error) {
            if (isNotFound(error)) return [];
            throw error;
        }

        return entries
            .filter(name => name.startsWith(prefix) && /^\d+(\.|$)/.test(name.slice(prefix.length)))
            .sort((a, b) => trackNumberOf(a, prefix) - trackNumberOf(b, prefix))
            .map(name => join(this.dir, name));
    }

    /** Deletes every artifact of a release; returns how many files were removed. */
    async cleanupRelease(releaseId: string): Promise<number> {
        const files = [
            ...(await this.findExisting(releaseId, "audio")),
            ...(await this.findExisting(releaseId, "video")),
        ];
        for (const file of files) {
            await this.remove(file);
        }
        console.log(`[Artifacts] Cleaned up ${files.length} artifacts for ${releaseId}`);
        return files.length;
    }
}

function trackNumberOf(name: string, prefix: string): number {
    return Number.parseInt(name.slice(prefix.length), 10);
}
