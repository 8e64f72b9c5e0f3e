export abstract class MigrationError extends Error {
    abstract readonly code: string;
}

export class TableNotFoundError extends MigrationError {
    readonly code = "TableNotFound";

    constructor(
        public readonly tableName: string,
        public readonly store: string,
        options?: { cause?: unknown },
    ) {
        super( `Table ${ tableName } was not found in ${ store }`, options );
        this.name = "TableNotFoundError";
    }
}

export class TableExistsError extends MigrationError {
    readonly code = "TableExists";

    constructor(
        public readonly tableName: string,
        public readonly store: string,
        options?: { cause?: unknown },
    ) {
        super( `Table ${ tableName } already exists in ${ store }`, options );
        this.name = "TableExistsError";
    }
}

export class BatchSizeError extends MigrationError {
    readonly code = "BatchSizeExceeded";

    constructor( public readonly size: number, public readonly maxSize: number ) {
        super( `Batch of ${ size } items exceeds the maximum of ${ maxSize }` );
        this.name = "BatchSizeError";
    }
}

export class RetryLimitExceededError extends MigrationError {
    readonly code = "RetryLimitExceeded";

    constructor(
        public readonly tableName: string,
        public readonly attempts: number,
        public readonly elapsedMs: number,
        public readonly unprocessedCount: number,
    ) {
        super(
            `Gave up on ${ unprocessedCount } unprocessed item(s) for table ${ tableName } after ${ attempts } attempt(s) in ${ Math.round( elapsedMs ) }ms`
        );
        this.name = "RetryLimitExceededError";
    }
}

export class ConfigError extends MigrationError {
    readonly code = "InvalidConfig";

    constructor( public readonly variable: string, message: string ) {
        super( `${ variable }: ${ message }` );
        this.name = "ConfigError";
    }
}

export function toErrorMessage( error: unknown ): string {
    if ( error instanceof Error ) {
        return error.message;
    }

    return String( error );
}
