export class RemoteRequestError extends Error {
    readonly entity: string;
    readonly status?: number;
    readonly code?: string;

    constructor(entity: string, message: string, details: { status?: number; code?: string; cause?: unknown } = {}) {
        super(message, { cause: details.cause });
        this.name = 'RemoteRequestError';
        this.entity = entity;
        this.status = details.status;
        this.code = details.code;
    }
}

export class RemoteUnavailableError extends Error {
    readonly entity: string;
    readonly offset: number;

    constructor(entity: string, offset: number, message: string) {
        super(message);
        this.name = 'RemoteUnavailableError';
        this.entity = entity;
        this.offset = offset;
    }
}

export class CatalogCycleError extends Error {
    readonly catalog: string;
    readonly keys: string[];

    constructor(catalog: string, keys: string[]) {
        super(`Parent cycle in ${catalog}: ${keys.join(' -> ')}`);
        this.name = 'CatalogCycleError';
        this.catalog = catalog;
        this.keys = keys;
    }
}

export class InvalidWindowError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidWindowError';
    }
}

export class StageError extends Error {
    readonly stage: string;

    constructor(stage: string, cause: unknown) {
        super(`Stage ${stage} failed: ${errorMessage(cause)}`, { cause });
        this.name = 'StageError';
        this.stage = stage;
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
