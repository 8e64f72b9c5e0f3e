import { fullJitterDelay, MAX_TIMER_DELAY_MS } from "../common/backoff";
import { DebugLogger } from "../common/debug-logger";
import { chunkArray, delay } from "../common/utils";
import {
    DYNAMODB_MAX_BATCH_WRITE_ITEMS,
    type IStoreClient,
    type TDynamoDBItem
} from "../dynamo-db/dynamo-db-defs";
import { BatchSizeError, RetryLimitExceededError, toErrorMessage } from "./migration-errors";
import type { MigrationEvents } from "./migration-events";

const debug = DebugLogger.create( 'migration:batch-writer' );

export interface IRetryOptions {
    /**
     * Upper bound of the first retry delay, doubled on each attempt.
     */
    baseDelayMs?: number;
    /**
     * Cap of a single delay, never above `MAX_TIMER_DELAY_MS`.
     */
    maxDelayMs?: number;
    /**
     * Resubmissions allowed for the unprocessed remainder of one batch.
     */
    maxAttempts?: number;
    maxElapsedMs?: number;
}

export interface IBatchWriterOptions extends IRetryOptions {
    batchSize?: number;
    events?: MigrationEvents;
    random?: () => number;
    sleep?: ( ms: number ) => Promise<void>;
    now?: () => number;
}

export interface IBatchWriteSummary {
    totalBatches: number;
    failedBatches: number;
    written: number;
}

interface IBatchContext {
    tableName: string;
    page: number;
    batch: number;
    /**
     * Items of the batch the destination accepted so far.
     */
    accepted: number;
}

export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

export class DynamoDBBatchWriter {
    private readonly batchSize: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly maxAttempts: number;
    private readonly maxElapsedMs: number;

    private readonly events: MigrationEvents | undefined;
    private readonly random: () => number;
    private readonly sleep: ( ms: number ) => Promise<void>;
    private readonly now: () => number;

    public constructor( private readonly destination: IStoreClient, options: IBatchWriterOptions = {} ) {
        const {
            batchSize = DYNAMODB_MAX_BATCH_WRITE_ITEMS,
            baseDelayMs = DEFAULT_RETRY_BASE_DELAY_MS,
            maxDelayMs = MAX_TIMER_DELAY_MS,
            maxAttempts = Infinity,
            maxElapsedMs = Infinity,
        } = options;

        if ( ! Number.isInteger( batchSize ) || batchSize < 1 || batchSize > DYNAMODB_MAX_BATCH_WRITE_ITEMS ) {
            throw new BatchSizeError( batchSize, DYNAMODB_MAX_BATCH_WRITE_ITEMS );
        }

        this.batchSize = batchSize;
        this.baseDelayMs = baseDelayMs;
        this.maxDelayMs = Math.min( maxDelayMs, MAX_TIMER_DELAY_MS );
        this.maxAttempts = maxAttempts;
        this.maxElapsedMs = maxElapsedMs;

        this.events = options.events;
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? delay;
        this.now = options.now ?? Date.now;
    }

    /**
     * Writes the items in contiguous batches, in order.
     *
     * A batch that fails at the request level is reported and skipped, it is not retried.
     */
    public async writeItems( items: readonly TDynamoDBItem[], tableName: string, page = 1 ): Promise<IBatchWriteSummary> {
        if ( ! items.length ) {
            debug( () => [ `Table ${ tableName } is empty, page: ${ page }` ] );

            this.events?.emit( 'table:empty', { table: tableName, page } );

            return { totalBatches: 0, failedBatches: 0, written: 0 };
        }

        const batches = chunkArray( items, this.batchSize );
        const summary: IBatchWriteSummary = {
            totalBatches: batches.length,
            failedBatches: 0,
            written: 0,
        };

        for ( const [ index, batch ] of batches.entries() ) {
            const context: IBatchContext = { tableName, page, batch: index + 1, accepted: 0 };

            try {
                await this.writeBatch( batch, context );

                summary.written += batch.length;

                this.events?.emit( 'batch:written', {
                    table: tableName,
                    page,
                    batch: context.batch,
                    totalBatches: batches.length,
                    count: batch.length,
                } );
            } catch ( error ) {
                summary.failedBatches++;
                summary.written += context.accepted;

                debug( () => [ `Batch ${ context.batch }/${ batches.length } for ${ tableName } failed: ${ toErrorMessage( error ) }` ] );

                this.events?.emit( 'batch:failed', {
                    table: tableName,
                    page,
                    batch: context.batch,
                    totalBatches: batches.length,
                    error,
                } );
            }
        }

        return summary;
    }

    private async writeBatch( batch: TDynamoDBItem[], context: IBatchContext ) {
        const startedAt = this.now();

        let unprocessed = await this.destination.batchWrite( context.tableName, batch );
        let attempt = 0;

        context.accepted = batch.length - unprocessed.length;

        while ( unprocessed.length ) {
            const elapsedMs = this.now() - startedAt;

            if ( attempt >= this.maxAttempts || elapsedMs >= this.maxElapsedMs ) {
                throw new RetryLimitExceededError( context.tableName, attempt, elapsedMs, unprocessed.length );
            }

            const delayMs = fullJitterDelay( attempt, {
                baseDelayMs: this.baseDelayMs,
                maxDelayMs: this.maxDelayMs,
                random: this.random,
            } );

            ++attempt;

            this.events?.emit( 'batch:retry', {
                table: context.tableName,
                page: context.page,
                batch: context.batch,
                attempt,
                delayMs,
                unprocessedCount: unprocessed.length,
            } );

            await this.sleep( delayMs );

            unprocessed = await this.destination.batchWrite( context.tableName, unprocessed );

            context.accepted = batch.length - unprocessed.length;
        }
    }
}

export function writeItems(
    items: readonly TDynamoDBItem[],
    tableName: string,
    destination: IStoreClient,
    options: IBatchWriterOptions = {}
): Promise<IBatchWriteSummary> {
    return new DynamoDBBatchWriter( destination, options ).writeItems( items, tableName );
}
