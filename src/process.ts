// src/process.ts
import { spawn } from "node:child_process";

export interface ProcessResult {
    code: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface RunOptions {
    timeoutMs: number;
}

/**
 * Launches a tool and collects its output. Resolves for any exit status
 * (callers decide what a non-zero code means) and rejects only when the
 * binary cannot be spawned at all.
 */
export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

export const MAX_CAPTURE_CHARS = 1024 * 1024;

export const runProcess: ProcessRunner = (command, args, options) => {
    return new Promise<ProcessResult>((resolve, reject) => {
        const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

        let stdout = "";
        let stderr = "";
        let timedOut = false;

        // ffmpeg is chatty on stderr; keep only the most recent output
        const append = (current: string, chunk: string) => {
            const next = current + chunk;
            return next.length > MAX_CAPTURE_CHARS ? next.slice(-MAX_CAPTURE_CHARS) : next;
        };

        // decode as a stream so multi-byte characters split across chunks survive
        proc.stdout.setEncoding("utf8");
        proc.stderr.setEncoding("utf8");
        proc.stdout.on("data", (chunk: string) => {
            stdout = append(stdout, chunk);
        });
        proc.stderr.on("data", (chunk: string) => {
            stderr = append(stderr, chunk);
        });

        const timer = setTimeout(() => {
            timedOut = true;
            proc.kill("SIGKILL");
        }, options.timeoutMs);

        proc.on("error", (error) => {
            clearTimeout(timer);
            reject(error);
        });

        proc.on("close", (code) => {
            clearTimeout(timer);
            resolve({ code, stdout, stderr, timedOut });
        });
    });
};
