import { DebugLogger } from "../common/debug-logger";
import type { IScanPage, IStoreClient, TDynamoDBItem } from "../dynamo-db/dynamo-db-defs";
import { DynamoDBBatchWriter, type IBatchWriterOptions } from "./batch-writer";
import { TableNotFoundError } from "./migration-errors";
import type { MigrationEvents } from "./migration-events";
import { cursorsEqual, diff, pagesEqual } from "./page-comparator";

const debug = DebugLogger.create( 'migration:table-synchronizer' );

export type TTableSyncResult =
    | { tableName: string; status: 'synced'; pages: number; itemsWritten: number; failedBatches: number }
    | { tableName: string; status: 'not-found'; store: string }
    | { tableName: string; status: 'failed'; error: unknown };

export interface ITableSynchronizerOptions extends IBatchWriterOptions {
    events?: MigrationEvents;
}

interface ITableProgress {
    tableName: string;
    page: number;
    itemsWritten: number;
    failedBatches: number;
}

/**
 * Copies the items of one table that are missing at the destination.
 *
 * Both scans advance in lockstep while their cursors match, which skips prefixes left by a
 * previous run. Once they diverge every remaining source page is copied unconditionally.
 */
export class TableSynchronizer {
    private readonly writer: DynamoDBBatchWriter;
    private readonly events: MigrationEvents | undefined;

    public constructor(
        private readonly source: IStoreClient,
        private readonly destination: IStoreClient,
        options: ITableSynchronizerOptions = {}
    ) {
        this.events = options.events;
        this.writer = new DynamoDBBatchWriter( destination, options );
    }

    public async synchronize( tableName: string ): Promise<TTableSyncResult> {
        this.events?.emit( 'table:start', {
            table: tableName,
            source: this.source.label,
            destination: this.destination.label,
        } );

        const progress: ITableProgress = { tableName, page: 1, itemsWritten: 0, failedBatches: 0 };

        debug( () => [ `Scanning table ${ tableName } in source ${ this.source.label }` ] );

        let sourcePage = await this.source.scan( tableName );
        let destinationPage: IScanPage;

        try {
            debug( () => [ `Scanning table ${ tableName } in destination ${ this.destination.label }` ] );

            destinationPage = await this.destination.scan( tableName );
        } catch ( error ) {
            if ( error instanceof TableNotFoundError ) {
                this.events?.emit( 'table:not-found', { table: tableName, store: this.destination.label } );

                return { tableName, status: 'not-found', store: this.destination.label };
            }

            throw error;
        }

        await this.comparePages( sourcePage.items, destinationPage.items, progress );

        while ( cursorsEqual( sourcePage.cursor, destinationPage.cursor ) ) {
            progress.page++;

            sourcePage = await this.source.scan( tableName, sourcePage.cursor );
            destinationPage = await this.destination.scan( tableName, destinationPage.cursor );

            await this.comparePages( sourcePage.items, destinationPage.items, progress );
        }

        debug( () => [ `Table ${ tableName } left lockstep at page ${ progress.page }, copying the remaining source pages` ] );

        while ( sourcePage.cursor ) {
            progress.page++;

            sourcePage = await this.source.scan( tableName, sourcePage.cursor );

            this.events?.emit( 'page:tail', { table: tableName, page: progress.page, count: sourcePage.items.length } );

            await this.write( sourcePage.items, progress );
        }

        this.events?.emit( 'table:done', {
            table: tableName,
            pages: progress.page,
            itemsWritten: progress.itemsWritten,
        } );

        return {
            tableName,
            status: 'synced',
            pages: progress.page,
            itemsWritten: progress.itemsWritten,
            failedBatches: progress.failedBatches,
        };
    }

    private async comparePages(
        sourceItems: TDynamoDBItem[],
        destinationItems: TDynamoDBItem[],
        progress: ITableProgress
    ) {
        if ( pagesEqual( sourceItems, destinationItems ) ) {
            this.events?.emit( 'page:identical', { table: progress.tableName, page: progress.page } );
            return;
        }

        const missing = diff( sourceItems, destinationItems );

        this.events?.emit( 'page:diff', {
            table: progress.tableName,
            page: progress.page,
            sourceCount: sourceItems.length,
            missingCount: missing.length,
        } );

        if ( missing.length ) {
            await this.write( missing, progress );
        }
    }

    private async write( items: TDynamoDBItem[], progress: ITableProgress ) {
        const summary = await this.writer.writeItems( items, progress.tableName, progress.page );

        progress.itemsWritten += summary.written;
        progress.failedBatches += summary.failedBatches;
    }
}

export function synchronizeTable(
    tableName: string,
    source: IStoreClient,
    destination: IStoreClient,
    options: ITableSynchronizerOptions = {}
): Promise<TTableSyncResult> {
    return new TableSynchronizer( source, destination, options ).synchronize( tableName );
}
