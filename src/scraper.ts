// src/scraper.ts
import { z } from "zod";
import { UpstreamDataError, ValidationError } from "./errors";

export interface TrackDescriptor {
    number: number;     // 1-based
    name: string;       // raw display name, see sanitizeTrackName
    url: string;
    filename: string;
}

export interface ReleaseMetadata {
    identifier: string;
    title: string;
    performer: string;
    venue: string;
    date: string;
    url: string;
    tracks: TrackDescriptor[];
}

export interface Scraper {
    extractMetadata(sourceUrl: string): Promise<ReleaseMetadata>;
}

export interface ReleaseUrl {
    identifier: string;
    url: string;
}

const ARCHIVE_HOSTS = new Set(["archive.org", "www.archive.org"]);

/**
 * Accepts `https://archive.org/details/<identifier>[/...]` and returns the
 * identifier; anything else is a ValidationError.
 */
export function parseReleaseUrl(input: string): ReleaseUrl {
    const trimmed = input.trim();
    let url: URL;
    try {
        url = new URL(trimmed);
    } catch {
        throw new ValidationError("Invalid archive.org URL");
    }

    if ((url.protocol !== "https:" && url.protocol !== "http:") || !ARCHIVE_HOSTS.has(url.hostname)) {
        throw new ValidationError("Invalid archive.org URL");
    }

    const [section, identifier] = url.pathname.split("/").filter(Boolean);
    if (section !== "details" || !identifier || !/^[A-Za-z0-9._-]+$/.test(identifier)) {
        throw new ValidationError("Invalid archive.org URL");
    }

    return { identifier, url: trimmed };
}

const textField = z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(value => (Array.isArray(value) ? value.join(", ") : value)?.trim() || undefined);

const metadataResponseSchema = z.object({
    metadata: z
        .object({
            identifier: z.string().optional(),
            title: textField,
            creator: textField,
            venue: textField,
            coverage: textField,
            date: textField,
        })
        .passthrough()
        .optional(),
    files: z
        .array(
            z
                .object({
                    name: z.string(),
                    format: z.string().optional(),
                    title: z.string().optional(),
                    track: z.string().optional(),
                })
                .passthrough(),
        )
        .optional(),
});

type ArchiveFile = NonNullable<z.infer<typeof metadataResponseSchema>["files"]>[number];

/** Audio formats in order of preference; the first one present wins. */
export const AUDIO_FORMATS = ["VBR MP3", "MP3", "Ogg Vorbis", "Flac", "24bit Flac"];

export interface ArchiveScraperOptions {
    baseUrl?: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
}

export class ArchiveScraper implements Scraper {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: ArchiveScraperOptions = {}) {
        this.baseUrl = (options.baseUrl ?? "https://archive.org").replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async extractMetadata(sourceUrl: string): Promise<ReleaseMetadata> {
        const { identifier, url } = parseReleaseUrl(sourceUrl);

        let body: unknown;
        try {
            const response = await this.fetchImpl(`${this.baseUrl}/metadata/${identifier}`, {
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            if (!response.ok) {
                throw new UpstreamDataError(`archive.org metadata request failed: ${response.status} ${response.statusText}`);
            }
            body = await response.json();
        } catch (error) {
            if (error instanceof UpstreamDataError) throw error;
            throw new UpstreamDataError(`Could not fetch metadata for ${identifier}`, { cause: error });
        }

        const parsed = metadataResponseSchema.safeParse(body);
        if (!parsed.success || !parsed.data.metadata) {
            throw new UpstreamDataError(`No metadata found for ${identifier}`);
        }

        const meta = parsed.data.metadata;
        const tracks = this.collectTracks(identifier, parsed.data.files ?? []);
        if (tracks.length === 0) {
            throw new UpstreamDataError(`No audio tracks found for ${identifier}`);
        }

        return {
            identifier,
            title: meta.title ?? identifier,
            performer: meta.creator ?? "Unknown",
            venue: meta.venue ?? meta.coverage ?? "Unknown",
            date: meta.date ?? "Unknown",
            url,
            tracks,
        };
    }

    private collectTracks(identifier: string, files: ArchiveFile[]): TrackDescriptor[] {
        const format = AUDIO_FORMATS.find(f => files.some(file => file.format === f));
        if (!format) return [];

        return files
            .filter(file => file.format === format)
            .sort((a, b) => compareTracks(a, b))
            .map((file, index) => ({
                number: index + 1,
                name: file.title ?? stripExtension(basename(file.name)),
                url: `${this.baseUrl}/download/${identifier}/${file.name.split("/").map(encodeURIComponent).join("/")}`,
                filename: basename(file.name),
            }));
    }
}

function trackOrder(file: ArchiveFile): number {
    // "3" or "3/12"
    const value = Number.parseInt(file.track ?? "", 10);
    return Number.isFinite(value) ? value : Number.MAX_SAFE_INTEGER;
}

function compareTracks(a: ArchiveFile, b: ArchiveFile): number {
    return trackOrder(a) - trackOrder(b) || a.name.localeCompare(b.name);
}

function basename(path: string): string {
    return path.split("/").pop() ?? path;
}

function stripExtension(name: string): string {
    return name.replace(/\.[^.]+$/, "");
}
