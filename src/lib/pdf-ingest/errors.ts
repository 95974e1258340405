/**
 * Error raised for requests the pipeline refuses to process.  Route handlers
 * forward `status` as the HTTP status code.
 */
export class IngestError extends Error {
    readonly status: number;

    constructor(message: string, status = 400) {
        super(message);
        this.name = "IngestError";
        this.status = status;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
