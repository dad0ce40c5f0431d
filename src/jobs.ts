// src/jobs.ts
import { randomUUID } from "node:crypto";
import { JobNotFoundError, JobStateError } from "./errors";
import type { ProgressUpdate } from "./progress";

export type JobStatus = "pending" | "running" | "complete" | "failed";

export type JobProgress = ProgressUpdate;

export interface JobResult {
    releaseId: string;
    playlistId: string;
    playlistUrl: string;
    videoIds: string[];       // in track order
    videoPaths: string[];     // rendered artifacts, in track order
}

/** What leaves the server: local artifact paths stay behind. */
export type PublicJobResult = Omit<JobResult, "videoPaths">;

export function publicResult({ videoPaths: _paths, ...rest }: JobResult): PublicJobResult {
    return rest;
}

export interface Job {
    readonly id: string;
    readonly sourceUrl: string;
    readonly webhookUrl?: string;
    readonly status: JobStatus;
    readonly progress: JobProgress;
    readonly createdAt: number;
    readonly updatedAt: number;
    readonly result?: JobResult;   // only when complete
    readonly error?: string;       // only when failed
}

/**
 * Owns job records. Each record is an immutable snapshot that gets replaced
 * as a whole, so readers never observe a half-applied update.
 */
export interface JobRegistry {
    create(sourceUrl: string, webhookUrl?: string): Job;
    get(id: string): Job | undefined;
    list(): Job[];
    markRunning(id: string): Job;
    reportProgress(id: string, progress: JobProgress): Job;
    complete(id: string, result: JobResult): Job;
    fail(id: string, error: string): Job;
}

const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
    pending: ["running"],
    running: ["complete", "failed"],
    complete: [],
    failed: [],
};

export function isTerminal(status: JobStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

const ID_LENGTH = 8;

export class InMemoryJobRegistry implements JobRegistry {
    private readonly jobs = new Map<string, Job>();

    constructor(private readonly now: () => number = Date.now) {}

    create(sourceUrl: string, webhookUrl?: string): Job {
        let id = randomUUID().slice(0, ID_LENGTH);
        while (this.jobs.has(id)) {
            id = randomUUID().slice(0, ID_LENGTH);
        }

        const now = this.now();
        const job: Job = {
            id,
            sourceUrl,
            webhookUrl,
            status: "pending",
            progress: { message: "Queued...", current: 0, total: 0 },
            createdAt: now,
            updatedAt: now,
        };
        this.jobs.set(id, Object.freeze(job));
        return job;
    }

    get(id: string): Job | undefined {
        return this.jobs.get(id);
    }

    list(): Job[] {
        return Array.from(this.jobs.values());
    }

    markRunning(id: string): Job {
        return this.transition(id, "running", { progress: { message: "Starting...", current: 0, total: 0 } });
    }

    reportProgress(id: string, progress: JobProgress): Job {
        const job = this.require(id);
        if (job.status !== "running") {
            throw new JobStateError(`Job ${id} is ${job.status}, cannot report progress`);
        }
        return this.replace(job, { progress: { ...progress } });
    }

    complete(id: string, result: JobResult): Job {
        const total = this.require(id).progress.total;
        return this.transition(id, "complete", {
            result,
            progress: { message: "Complete!", current: total, total },
        });
    }

    fail(id: string, error: string): Job {
        return this.transition(id, "failed", { error });
    }

    private transition(id: string, to: JobStatus, updates: Partial<Job>): Job {
        const job = this.require(id);
        if (!TRANSITIONS[job.status].includes(to)) {
            throw new JobStateError(`Job ${id} cannot move from ${job.status} to ${to}`);
        }
        return this.replace(job, { ...updates, status: to });
    }

    private replace(job: Job, updates: Partial<Job>): Job {
        const next: Job = { ...job, ...updates, updatedAt: this.now() };
        this.jobs.set(job.id, Object.freeze(next));
        return next;
    }

    private require(id: string): Job {
        const job = this.jobs.get(id);
        if (!job) throw new JobNotFoundError(id);
        return job;
    }
}
