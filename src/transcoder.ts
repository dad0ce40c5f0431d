// src/transcoder.ts
import { ArtifactStore, fileSize, type ArtifactCheck } from "./artifacts";
import { EncodeError, EncodeTimeoutError, ProbeError } from "./errors";
import { Prober } from "./prober";
import { runProcess, type ProcessRunner } from "./process";

export interface TranscoderOptions {
    ffmpegPath: string;
    timeoutMs: number;       // per track, default one hour
    audioBitrate?: string;   // e.g. "192k"
    run?: ProcessRunner;
}

/** Smallest file we accept as a rendered video. */
export const MIN_VIDEO_BYTES = 1024;
/** Allowed drift between probed and expected duration, in seconds. */
export const DURATION_TOLERANCE_SECONDS = 5;

const CANVAS_WIDTH = 1920;
const CANVAS_HEIGHT = 1080;

/**
 * Renders one audio track over a still image into an H.264/AAC video.
 */
export class Transcoder {
    private readonly ffmpegPath: string;
    private readonly timeoutMs: number;
    private readonly audioBitrate: string;
    private readonly run: ProcessRunner;

    constructor(
        private readonly store: ArtifactStore,
        private readonly prober: Prober,
        options: TranscoderOptions,
    ) {
        this.ffmpegPath = options.ffmpegPath;
        this.timeoutMs = options.timeoutMs;
        this.audioBitrate = options.audioBitrate ?? "192k";
        this.run = options.run ?? runProcess;
    }

    async render(audioPath: string, imagePath: string, outputPath: string, expectedDuration?: number): Promise<string> {
        return this.store.resolveOrCreate(
            outputPath,
            target => this.encode(audioPath, imagePath, target),
            target => this.validate(target, expectedDuration),
        );
    }

    async validate(path: string, expectedDuration?: number): Promise<ArtifactCheck> {
        const size = await fileSize(path);
        if (size === undefined) {
            return { valid: false, reason: "file is missing" };
        }
        if (size < MIN_VIDEO_BYTES) {
            return { valid: false, reason: `file is too small (${size} bytes)` };
        }

        const probe = await this.prober.probe(path);
        if (probe instanceof ProbeError) {
            return { valid: false, reason: probe.message };
        }
        if (probe.durationSeconds <= 0) {
            return { valid: false, reason: `invalid duration (${probe.durationSeconds}s)` };
        }
        if (!probe.hasVideoStream) {
            return { valid: false, reason: "no video stream" };
        }
        if (!probe.hasAudioStream) {
            return { valid: false, reason: "no audio stream" };
        }
        if (expectedDuration && Math.abs(probe.durationSeconds - expectedDuration) > DURATION_TOLERANCE_SECONDS) {
            return {
                valid: false,
                reason: `duration ${probe.durationSeconds.toFixed(2)}s does not match expected ${expectedDuration.toFixed(2)}s`,
            };
        }
        return { valid: true };
    }

    buildArgs(audioPath: string, imagePath: string, outputPath: string): string[] {
        return [
            "-loop", "1",
            "-i", imagePath,
            "-i", audioPath,
            "-c:v", "libx264",
            "-preset", "slow",
            "-crf", "18",
            "-c:a", "aac",
            "-b:a", this.audioBitrate,
            "-shortest",  // stop when the audio ends
            "-pix_fmt", "yuv420p",
            "-vf", `scale=${CANVAS_WIDTH}:${CANVAS_HEIGHT}:force_original_aspect_ratio=decrease,pad=${CANVAS_WIDTH}:${CANVAS_HEIGHT}:(ow-iw)/2:(oh-ih)/2`,
            "-y",
            outputPath,
        ];
    }

    private async encode(audioPath: string, imagePath: string, outputPath: string) {
        console.log(`[Transcoder] Rendering ${outputPath}...`);
        const started = Date.now();

        let result;
        try {
            result = await this.run(this.ffmpegPath, this.buildArgs(audioPath, imagePath, outputPath), {
                timeoutMs: this.timeoutMs,
            });
        } catch (error) {
            await this.store.remove(outputPath);
            throw new EncodeError(`Could not run ffmpeg for ${outputPath}`, "", { cause: error });
        }

        if (result.timedOut) {
            await this.store.remove(outputPath);
            throw new EncodeTimeoutError(`ffmpeg timed out after ${this.timeoutMs}ms rendering ${outputPath}`, result.stderr);
        }
        if (result.code !== 0) {
            await this.store.remove(outputPath);
            throw new EncodeError(`ffmpeg failed with exit code ${result.code} rendering ${outputPath}`, result.stderr);
        }
        if ((await fileSize(outputPath)) === undefined) {
            throw new EncodeError(`ffmpeg reported success but ${outputPath} was not created`, result.stderr);
        }

        console.log(`[Transcoder] Rendered ${outputPath} in ${((Date.now() - started) / 1000).toFixed(1)}s`);
    }

    /** Startup check that the encoder binary runs at all. */
    async checkAvailable(): Promise<boolean> {
        try {
            const result = await this.run(this.ffmpegPath, ["-version"], { timeoutMs: 5000 });
            return result.code === 0;
        } catch (error) {
            console.warn(`[Transcoder] ffmpeg is not available at ${this.ffmpegPath}:`, error);
            return false;
        }
    }
}
