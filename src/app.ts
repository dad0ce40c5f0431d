// src/app.ts
import { Hono, type Context } from "hono";
import { z } from "zod";
import type { CredentialHandle, SessionTokens } from "./auth";
import { AuthError, PipelineError, ValidationError } from "./errors";
import { publicResult, type Job } from "./jobs";
import type { ReleasePreview } from "./preview";
import type { JobRunner } from "./runner";

export interface AppDeps {
    runner: JobRunner;
    tokens: SessionTokens;
    preview: (url: string) => Promise<ReleasePreview>;
}

type Env = { Variables: { credentials: CredentialHandle } };

const submitSchema = z.object({
    url: z.string().min(1, "URL is required"),
    webhookUrl: z.string().optional(),
});

const previewSchema = z.object({
    url: z.string().min(1, "URL is required"),
});

/** Public shape of a job for status polling. */
export function jobView(job: Job) {
    return {
        jobId: job.id,
        status: job.status,
        progress: job.progress,
        ...(job.status === "complete" && job.result ? { result: publicResult(job.result) } : {}),
        ...(job.status === "failed" && job.error ? { error: job.error } : {}),
    };
}

function statusFor(error: unknown): 400 | 401 | 404 | 409 | 500 | 502 {
    if (!(error instanceof PipelineError)) return 500;
    switch (error.code) {
        case "validation":
        case "upstream_data":
            return 400;
        case "unauthorized":
            return 401;
        case "job_not_found":
            return 404;
        case "job_state":
            return 409;
        case "upload":
            return 502;
        default:
            return 500;
    }
}

async function readBody<T>(c: Context<Env>, schema: z.ZodType<T>): Promise<T> {
    let body: unknown;
    try {
        body = await c.req.json();
    } catch {
        throw new ValidationError("Request body must be JSON");
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(i => i.message).join("; "));
    }
    return parsed.data;
}

export function createApp(deps: AppDeps) {
    const app = new Hono<Env>();

    app.onError((error, c) => {
        const status = statusFor(error);
        if (status === 500) {
            console.error("[API] Unhandled error:", error);
            return c.json({ error: "Internal server error" }, status);
        }
        return c.json({ error: error.message }, status);
    });

    app.get("/health", c => c.json({ ok: true }));

    // --- JWT auth middleware ---
    app.use("/api/*", async (c, next) => {
        const authHeader = c.req.header("Authorization");
        if (!authHeader || !authHeader.startsWith("Bearer ")) {
            throw new AuthError("Missing or invalid Authorization header");
        }

        c.set("credentials", await deps.tokens.verifyToken(authHeader.substring(7)));
        await next();
    });

    // --- Submit a release ---
    app.post("/api/jobs", async c => {
        const body = await readBody(c, submitSchema);
        const job = deps.runner.submit(body.url, c.get("credentials"), { webhookUrl: body.webhookUrl });
        return c.json({ jobId: job.id, status: job.status }, 202);
    });

    app.get("/api/jobs", c => c.json(deps.runner.list().map(jobView)));

    app.get("/api/jobs/:id", c => c.json(jobView(deps.runner.status(c.req.param("id")))));

    // --- Flip a finished job's videos and playlist to public ---
    app.post("/api/jobs/:id/publish", async c => {
        const result = await deps.runner.publish(c.req.param("id"), c.get("credentials"));
        return c.json({ ok: true, ...result });
    });

    app.post("/api/preview", async c => {
        const body = await readBody(c, previewSchema);
        return c.json(await deps.preview(body.url));
    });

    return app;
}
