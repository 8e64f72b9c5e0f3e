import type {
    CreateTableCommandInput,
    GlobalSecondaryIndex,
    LocalSecondaryIndex,
    ProvisionedThroughput,
    ProvisionedThroughputDescription,
    TableDescription
} from "@aws-sdk/client-dynamodb";

import { DebugLogger } from "../common/debug-logger";
import { TableExistsError, toErrorMessage } from "../migration/migration-errors";
import type { MigrationEvents } from "../migration/migration-events";
import type { IStoreClient } from "./dynamo-db-defs";

const debug = DebugLogger.create( 'dynamodb:schema' );

export type TSchemaCopyResult =
    | { tableName: string; status: 'created' }
    | { tableName: string; status: 'exists' }
    | { tableName: string; status: 'failed'; error: unknown };

/**
 * Drops the server assigned counters (`NumberOfDecreasesToday`, increase/decrease timestamps),
 * which are rejected on create.
 */
function toProvisionedThroughput(
    description: ProvisionedThroughputDescription | undefined
): ProvisionedThroughput | undefined {
    if ( ! description ) {
        return undefined;
    }

    const { ReadCapacityUnits, WriteCapacityUnits } = description;

    if ( undefined === ReadCapacityUnits || undefined === WriteCapacityUnits ) {
        return undefined;
    }

    return { ReadCapacityUnits, WriteCapacityUnits };
}

export function toCreateTableInput( description: TableDescription ): CreateTableCommandInput {
    const { TableName, KeySchema, AttributeDefinitions } = description;

    if ( ! TableName || ! KeySchema?.length || ! AttributeDefinitions?.length ) {
        throw new Error(
            `Table description ${ TableName ?? '<unnamed>' } is missing its name, key schema or attribute definitions`
        );
    }

    const isOnDemand = description.BillingModeSummary?.BillingMode === 'PAY_PER_REQUEST';

    const globalSecondaryIndexes: GlobalSecondaryIndex[] | undefined =
        description.GlobalSecondaryIndexes?.map( index => {
            const globalIndex: GlobalSecondaryIndex = {
                IndexName: index.IndexName,
                KeySchema: index.KeySchema,
                Projection: index.Projection,
            };

            const provisionedThroughput = toProvisionedThroughput( index.ProvisionedThroughput );

            if ( ! isOnDemand && provisionedThroughput ) {
                globalIndex.ProvisionedThroughput = provisionedThroughput;
            }

            return globalIndex;
        } );

    const localSecondaryIndexes: LocalSecondaryIndex[] | undefined =
        description.LocalSecondaryIndexes?.map( index => ( {
            IndexName: index.IndexName,
            KeySchema: index.KeySchema,
            Projection: index.Projection,
        } ) );

    const input: CreateTableCommandInput = {
        TableName,
        KeySchema,
        AttributeDefinitions,
    };

    const provisionedThroughput = toProvisionedThroughput( description.ProvisionedThroughput );

    if ( isOnDemand ) {
        input.BillingMode = 'PAY_PER_REQUEST';
    } else if ( provisionedThroughput ) {
        input.ProvisionedThroughput = provisionedThroughput;
    }

    if ( globalSecondaryIndexes?.length ) {
        input.GlobalSecondaryIndexes = globalSecondaryIndexes;
    }

    if ( localSecondaryIndexes?.length ) {
        input.LocalSecondaryIndexes = localSecondaryIndexes;
    }

    if ( description.StreamSpecification?.StreamEnabled ) {
        input.StreamSpecification = description.StreamSpecification;
    }

    return input;
}

/**
 * Creates every source table at the destination, one-shot, failures are reported per table.
 * A table the destination already holds is skipped, so re-runs succeed.
 */
export async function copySchema(
    source: IStoreClient,
    destination: IStoreClient,
    tableNames: readonly string[] = [],
    events?: MigrationEvents
): Promise<TSchemaCopyResult[]> {
    const tables = tableNames.length ? [ ... tableNames ] : await source.list();
    const results: TSchemaCopyResult[] = [];

    for ( const tableName of tables ) {
        try {
            const description = await source.describe( tableName );
            const input = toCreateTableInput( description );

            debug( () => [ `Creating table ${ tableName } in ${ destination.label }`, input ] );

            await destination.create( input );

            events?.emit( 'schema:created', { table: tableName, store: destination.label } );
            results.push( { tableName, status: 'created' } );
        } catch ( error ) {
            if ( error instanceof TableExistsError ) {
                events?.emit( 'schema:exists', { table: tableName, store: destination.label } );
                results.push( { tableName, status: 'exists' } );
                continue;
            }

            debug( () => [ `Failed to create table ${ tableName }: ${ toErrorMessage( error ) }` ] );

            events?.emit( 'schema:failed', { table: tableName, store: destination.label, error } );
            results.push( { tableName, status: 'failed', error } );
        }
    }

    return results;
}
