import { DebugLogger } from "../common/debug-logger";
import { TableNotFoundError } from "../migration/migration-errors";
import type { IStoreClient, TDynamoDBCursor, TDynamoDBItem } from "./dynamo-db-defs";

const debug = DebugLogger.create( 'dynamodb:util' );

/**
 * Drains every page of a table, a missing table yields no items.
 */
export async function scanAll( store: IStoreClient, tableName: string ): Promise<TDynamoDBItem[]> {
    const items: TDynamoDBItem[] = [];
    let cursor: TDynamoDBCursor | undefined = undefined;
    let pages = 0;

    debug( () => [ `Scanning table ${ tableName } in ${ store.label }` ] );

    try {
        do {
            const page = await store.scan( tableName, cursor );

            items.push( ... page.items );
            cursor = page.cursor;

            ++pages;
        } while ( cursor );
    } catch ( error ) {
        if ( error instanceof TableNotFoundError ) {
            debug( () => [ `${ tableName } was not found in ${ store.label }` ] );
            return [];
        }

        throw error;
    }

    debug( () => [ `Scanned table ${ tableName } in ${ store.label }, pages: ${ pages }, items: ${ items.length }` ] );

    return items;
}
