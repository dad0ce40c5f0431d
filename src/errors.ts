// src/errors.ts
export type PipelineErrorCode =
    | "validation"
    | "config"
    | "upstream_data"
    | "download"
    | "artifact_invalid"
    | "external_tool"
    | "upload"
    | "job_not_found"
    | "job_state"
    | "unauthorized";

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Bad or unsupported input; reported synchronously and never retried. */
export class ValidationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super("validation", message, options);
    }
}

export class ConfigError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super("config", message, options);
    }
}

/** The source release has nothing we can process (no tracks, no audio). */
export class UpstreamDataError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super("upstream_data", message, options);
    }
}

export class DownloadError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super("download", message, options);
    }
}

export class ArtifactInvalidError extends PipelineError {
    readonly path: string;
    readonly reason: string;

    constructor(path: string, reason: string) {
        super("artifact_invalid", `Artifact ${path} failed validation: ${reason}`);
        this.path = path;
        this.reason = reason;
    }
}

/**
 * An external process (ffmpeg/ffprobe) exited badly or timed out.
 * `diagnostics` holds whatever the tool wrote to stderr.
 */
export class ExternalToolError extends PipelineError {
    readonly diagnostics: string;

    constructor(message: string, diagnostics = "", options?: ErrorOptions) {
        super("external_tool", message, options);
        this.diagnostics = diagnostics;
    }
}

export class ProbeError extends ExternalToolError {}

export class EncodeError extends ExternalToolError {}

export class EncodeTimeoutError extends ExternalToolError {}

export class UploadError extends PipelineError {
    readonly status?: number;

    constructor(message: string, status?: number, options?: ErrorOptions) {
        super("upload", message, options);
        this.status = status;
    }
}

export class JobNotFoundError extends PipelineError {
    constructor(id: string) {
        super("job_not_found", `Job ${id} not found`);
    }
}

export class JobStateError extends PipelineError {
    constructor(message: string) {
        super("job_state", message);
    }
}

export class AuthError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super("unauthorized", message, options);
    }
}

const DIAGNOSTIC_TAIL_LINES = 5;

/**
 * Short, human-readable cause for a failed job. Tool errors keep the
 * tail of their diagnostics; nothing here ever includes a stack trace.
 */
export function describeError(error: unknown): string {
    if (error instanceof ExternalToolError && error.diagnostics.trim()) {
        const tail = error.diagnostics
            .trim()
            .split(/\r?\n/)
            .slice(-DIAGNOSTIC_TAIL_LINES)
            .join(" | ");
        return `${error.message}: ${tail}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return "Unknown error";
}
