import type { IStoreClient } from "../../dynamo-db/dynamo-db-defs";
import { scanAll } from "../../dynamo-db/dynamo-db-util";

export async function dynamoDBcountItems( stores: IStoreClient[], commandIndex: number ) {
    const tableName = process.argv[ commandIndex + 1 ];

    if ( ! tableName ) {
        console.error( "Missing table name." );
        console.log( "Usage: @dynamodb-count-items <table-name>" );
        process.exit( 1 );
    }

    for ( const store of stores ) {
        const items = await scanAll( store, tableName );

        console.log( `Table ${ tableName } in ${ store.label }: ${ items.length } item(s)` );
    }
}
