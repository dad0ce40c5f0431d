// src/progress.ts
export interface ProgressUpdate {
    message: string;
    current: number;
    total: number;
}

export interface ProgressObserver {
    onProgress(update: ProgressUpdate): void;
}

/** Forwards every update to each observer; one throwing observer does not starve the rest. */
export class ProgressFanout implements ProgressObserver {
    constructor(private readonly observers: ProgressObserver[]) {}

    onProgress(update: ProgressUpdate) {
        for (const observer of this.observers) {
            try {
                observer.onProgress(update);
            } catch (error) {
                console.warn("[Progress] Observer failed:", error);
            }
        }
    }
}

export function logProgress(prefix: string): ProgressObserver {
    return {
        onProgress: ({ message, current, total }) => {
            console.log(`${prefix} [${current}/${total}] ${message}`);
        },
    };
}
