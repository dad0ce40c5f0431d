// src/runner.ts
import { setImmediate } from "node:timers/promises";
import type { CredentialHandle } from "./auth";
import { describeError, JobNotFoundError, JobStateError, ValidationError } from "./errors";
import { isTerminal, type Job, type JobRegistry, type JobResult } from "./jobs";
import { logProgress, ProgressFanout, type ProgressObserver } from "./progress";
import { parseReleaseUrl } from "./scraper";
import type { Uploader } from "./uploader";
import type { WebhookNotifier } from "./webhooks";

/** The part of Pipeline the runner needs; tests substitute their own. */
export interface PipelineRun {
    run(sourceUrl: string, credentials: CredentialHandle, observer: ProgressObserver): Promise<JobResult>;
}

export interface SubmitOptions {
    webhookUrl?: string;
}

export interface PublishResult {
    videosMadePublic: number;
    playlistUpdated: boolean;
    playlistUrl: string;
}

/**
 * Starts one pipeline execution per submitted job and answers status and
 * publish requests. A failing job only ever marks its own record.
 */
export class JobRunner {
    private readonly tasks = new Map<string, Promise<Job>>();

    constructor(
        private readonly registry: JobRegistry,
        private readonly pipeline: PipelineRun,
        private readonly uploader: Uploader,
        private readonly notifier?: WebhookNotifier,
    ) {}

    submit(url: string, credentials: CredentialHandle, options: SubmitOptions = {}): Job {
        const release = parseReleaseUrl(url);
        if (options.webhookUrl !== undefined && !isHttpUrl(options.webhookUrl)) {
            throw new ValidationError("Invalid webhook URL");
        }

        const job = this.registry.create(release.url, options.webhookUrl);
        console.log(`[Job ${job.id}] Submitted ${release.url}`);

        const task = this.execute(job.id, credentials)
            .catch((error: unknown) => {
                console.error(`[Job ${job.id}] Execution unit crashed:`, error);
                return this.registry.get(job.id) ?? job;
            })
            .finally(() => this.tasks.delete(job.id));
        this.tasks.set(job.id, task);
        return job;
    }

    status(id: string): Job {
        const job = this.registry.get(id);
        if (!job) throw new JobNotFoundError(id);
        return job;
    }

    list(): Job[] {
        return this.registry.list();
    }

    /** Resolves with the job once its execution unit has finished (immediately if it already has). */
    async settled(id: string): Promise<Job> {
        await this.tasks.get(id);
        return this.status(id);
    }

    async publish(id: string, credentials: CredentialHandle): Promise<PublishResult> {
        const job = this.status(id);
        if (job.status !== "complete") {
            throw new JobStateError("Job not complete yet");
        }
        if (!job.result) {
            throw new JobStateError("Job has no result");
        }

        const { videoIds, playlistId, playlistUrl } = job.result;
        console.log(`[Job ${id}] Publishing ${videoIds.length} videos and playlist ${playlistId}...`);
        const videosMadePublic = await this.uploader.setVideosPublic(credentials, videoIds);
        const playlistUpdated = await this.uploader.setPlaylistPublic(credentials, playlistId);
        console.log(`[Job ${id}] Published ${videosMadePublic}/${videoIds.length} videos, playlist ${playlistUpdated ? "updated" : "not updated"}`);

        return { videosMadePublic, playlistUpdated, playlistUrl };
    }

    private async execute(id: string, credentials: CredentialHandle): Promise<Job> {
        // let submit() return while the job is still pending
        await setImmediate();

        let job = this.status(id);
        try {
            job = this.registry.markRunning(id);
            const observer = new ProgressFanout([
                { onProgress: update => this.registry.reportProgress(id, update) },
                logProgress(`[Job ${id}]`),
            ]);

            const result = await this.pipeline.run(job.sourceUrl, credentials, observer);
            job = this.registry.complete(id, result);
            console.log(`[Job ${id}] Complete: ${result.playlistUrl}`);
        } catch (error) {
            console.error(`[Job ${id}] Error:`, error);
            job = this.registry.fail(id, describeError(error));
        }

        if (job.webhookUrl && this.notifier && isTerminal(job.status)) {
            await this.notifier.send(job.webhookUrl, job);
        }
        return job;
    }
}

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === "https:" || url.protocol === "http:";
    } catch {
        return false;
    }
}
