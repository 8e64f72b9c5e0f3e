import type { IMigrationConfig } from "../../config";
import type { IStoreClient } from "../../dynamo-db/dynamo-db-defs";
import { synchronizeAll } from "../../migration/migration-coordinator";
import type { MigrationEvents } from "../../migration/migration-events";

export async function dynamoDBmigrateData(
    source: IStoreClient,
    destination: IStoreClient,
    config: IMigrationConfig,
    tableNames: string[],
    events: MigrationEvents
) {
    const results = await synchronizeAll( source, destination, tableNames, {
        ... config.retry,
        batchSize: config.batchSize,
        excludedTables: config.excludedTables,
        events,
    } );

    if ( ! results.length ) {
        console.log( "No tables to migrate." );
        return true;
    }

    console.log( '\nMigration Report:' );
    console.log( '-------------------' );

    for ( const result of results ) {
        switch ( result.status ) {
            case 'synced':
                console.log( `${ result.tableName }: synced, pages: ${ result.pages }, items written: ${ result.itemsWritten }, failed batches: ${ result.failedBatches }` );
                break;

            case 'not-found':
                console.log( `${ result.tableName }: not found in ${ result.store }` );
                break;

            case 'failed':
                console.log( `${ result.tableName }: failed` );
                break;
        }
    }

    return results.every( ( result ) => result.status === 'synced' && ! result.failedBatches );
}
