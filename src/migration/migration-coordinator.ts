import { DebugLogger } from "../common/debug-logger";
import { DEFAULT_EXCLUDED_TABLES, type IStoreClient } from "../dynamo-db/dynamo-db-defs";
import { toErrorMessage } from "./migration-errors";
import { TableSynchronizer, type ITableSynchronizerOptions, type TTableSyncResult } from "./table-synchronizer";

const debug = DebugLogger.create( 'migration:coordinator' );

export interface IMigrationCoordinatorOptions extends ITableSynchronizerOptions {
    excludedTables?: readonly string[];
}

export async function resolveTableNames(
    source: IStoreClient,
    tableNames: readonly string[] = [],
    excludedTables: readonly string[] = DEFAULT_EXCLUDED_TABLES
): Promise<string[]> {
    const candidates = tableNames.length ? [ ... tableNames ] : await source.list();
    const excluded = new Set( excludedTables );

    return candidates.filter( ( tableName ) => ! excluded.has( tableName ) );
}

/**
 * Starts one independent task per table and settles once every task has finished.
 *
 * A failing table never rejects the returned promise, its error is part of its own result.
 */
export async function synchronizeAll(
    source: IStoreClient,
    destination: IStoreClient,
    tableNames: readonly string[] = [],
    options: IMigrationCoordinatorOptions = {}
): Promise<TTableSyncResult[]> {
    const tables = await resolveTableNames( source, tableNames, options.excludedTables );

    debug( () => [ `Synchronizing ${ tables.length } table(s) from ${ source.label } to ${ destination.label }`, tables ] );

    const synchronizer = new TableSynchronizer( source, destination, options );

    const tasks = tables.map( async ( tableName ): Promise<TTableSyncResult> => {
        try {
            return await synchronizer.synchronize( tableName );
        } catch ( error ) {
            debug( () => [ `Table ${ tableName } failed: ${ toErrorMessage( error ) }` ] );

            options.events?.emit( 'table:failed', { table: tableName, error } );

            return { tableName, status: 'failed', error };
        }
    } );

    return Promise.all( tasks );
}
