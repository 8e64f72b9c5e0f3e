import type { IStoreClient } from "../../dynamo-db/dynamo-db-defs";
import { copySchema } from "../../dynamo-db/dynamo-db-schema";
import type { MigrationEvents } from "../../migration/migration-events";

export async function dynamoDBcopySchema(
    source: IStoreClient,
    destination: IStoreClient,
    tableNames: string[],
    events: MigrationEvents
) {
    const results = await copySchema( source, destination, tableNames, events );

    const created = results.filter( ( result ) => result.status === 'created' );
    const existing = results.filter( ( result ) => result.status === 'exists' );
    const failed = results.filter( ( result ) => result.status === 'failed' );

    console.log(
        `Created ${ created.length }/${ results.length } table(s) in ${ destination.label }, ${ existing.length } already present`
    );

    return failed.length === 0;
}
