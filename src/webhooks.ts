// src/webhooks.ts
import { createHmac } from "node:crypto";
import { publicResult, type Job, type PublicJobResult } from "./jobs";

export interface WebhookPayload {
    event: "job.completed" | "job.failed";
    timestamp: string;
    job: {
        id: string;
        status: Job["status"];
        sourceUrl: string;
        result?: PublicJobResult;
        error?: string;
        createdAt: number;
        updatedAt: number;
    };
}

export function signWebhook(payload: string, secret: string): string {
    return createHmac("sha256", secret).update(payload).digest("hex");
}

export class WebhookNotifier {
    constructor(
        private readonly secret: string,
        private readonly fetchImpl: typeof fetch = fetch,
    ) {}

    /**
     * POSTs the job's terminal state. Delivery problems are logged and never
     * thrown: a webhook must not change the outcome of a job.
     */
    async send(webhookUrl: string, job: Job) {
        try {
            console.log(`[Webhook] Sending notification to ${webhookUrl}...`);

            const payload: WebhookPayload = {
                event: job.status === "complete" ? "job.completed" : "job.failed",
                timestamp: new Date().toISOString(),
                job: {
                    id: job.id,
                    status: job.status,
                    sourceUrl: job.sourceUrl,
                    result: job.result && publicResult(job.result),
                    error: job.error,
                    createdAt: job.createdAt,
                    updatedAt: job.updatedAt,
                },
            };
            const body = JSON.stringify(payload);

            const response = await this.fetchImpl(webhookUrl, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "User-Agent": "archive-playlist-pipeline/0.1",
                    "X-Webhook-Signature": signWebhook(body, this.secret),
                    "X-Webhook-Timestamp": payload.timestamp,
                },
                body,
                signal: AbortSignal.timeout(10000),
            });

            if (!response.ok) {
                console.warn(`[Webhook] Failed with status ${response.status}`);
            } else {
                console.log(`[Webhook] Notification sent successfully`);
            }
        } catch (error) {
            console.error(`[Webhook] Error sending notification:`, error);
        }
    }
}
