// src/prober.ts
import { z } from "zod";
import { ProbeError } from "./errors";
import { runProcess, type ProcessRunner } from "./process";

export interface MediaProbe {
    durationSeconds: number;
    hasVideoStream: boolean;
    hasAudioStream: boolean;
}

export interface ProberOptions {
    ffprobePath: string;
    timeoutMs: number;
    run?: ProcessRunner;
}

const probeOutputSchema = z.object({
    format: z.object({ duration: z.string().optional() }).passthrough().optional(),
    streams: z.array(z.object({ codec_type: z.string().optional() }).passthrough()).optional(),
});

/**
 * Wraps ffprobe. Failures come back as a ProbeError value instead of a
 * rejection, so callers can fall back to "unknown duration / invalid".
 */
export class Prober {
    private readonly ffprobePath: string;
    private readonly timeoutMs: number;
    private readonly run: ProcessRunner;

    constructor(options: ProberOptions) {
        this.ffprobePath = options.ffprobePath;
        this.timeoutMs = options.timeoutMs;
        this.run = options.run ?? runProcess;
    }

    async probe(input: string): Promise<MediaProbe | ProbeError> {
        const args = [
            "-v", "error",
            "-show_entries", "format=duration:stream=codec_type",
            "-of", "json",
            input,
        ];

        let result;
        try {
            result = await this.run(this.ffprobePath, args, { timeoutMs: this.timeoutMs });
        } catch (error) {
            return new ProbeError(`Could not run ffprobe on ${input}`, "", { cause: error });
        }

        if (result.timedOut) {
            return new ProbeError(`ffprobe timed out after ${this.timeoutMs}ms on ${input}`, result.stderr);
        }
        if (result.code !== 0) {
            return new ProbeError(`ffprobe exited with code ${result.code} on ${input}`, result.stderr);
        }

        let json: unknown;
        try {
            json = JSON.parse(result.stdout);
        } catch (error) {
            return new ProbeError(`ffprobe returned malformed output for ${input}`, result.stdout, { cause: error });
        }

        const parsed = probeOutputSchema.safeParse(json);
        if (!parsed.success) {
            return new ProbeError(`ffprobe returned unexpected output for ${input}`, parsed.error.message);
        }

        const duration = Number.parseFloat(parsed.data.format?.duration ?? "");
        const streams = parsed.data.streams ?? [];

        return {
            durationSeconds: Number.isFinite(duration) ? duration : 0,
            hasVideoStream: streams.some(s => s.codec_type === "video"),
            hasAudioStream: streams.some(s => s.codec_type === "audio"),
        };
    }

    /**
     * Duration in seconds, or 0 when the file cannot be probed.
     */
    async durationOf(input: string): Promise<number> {
        const result = await this.probe(input);
        if (result instanceof ProbeError) {
            console.warn(`[Prober] ${result.message}, using duration 0`);
            return 0;
        }
        return result.durationSeconds;
    }
}
