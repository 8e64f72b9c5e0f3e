import { dynamoDBcopySchema } from "./commands/dynamodb/dynamodb-copy-schema";
import { dynamoDBcountItems } from "./commands/dynamodb/dynamodb-count-items";
import { dynamoDBmigrateData } from "./commands/dynamodb/dynamodb-migrate-data";

import { loadMigrationConfig } from "./config";
import { createStoreClient } from "./dynamo-db/dynamo-db-client";
import { MigrationEvents } from "./migration/migration-events";
import { attachConsoleReporter } from "./migration/migration-reporter";

function getCommandArguments( commandIndex: number ) {
    return process.argv
        .slice( commandIndex + 1 )
        .filter( ( arg ) => ! arg.startsWith( "--" ) );
}

async function main() {
    // Find an argument that starts with '@'.
    const commandIndex = process.argv.findIndex( ( arg ) => arg.startsWith( "@" ) );

    if ( commandIndex === -1 ) {
        console.error( "No command specified." );
        process.exit( 1 );
    }

    console.log( "Command:", process.argv[ commandIndex ] );

    const commandAction = process.argv[ commandIndex ];

    const config = loadMigrationConfig();

    const source = createStoreClient( config.source, { scanPageLimit: config.scanPageLimit } );
    const destination = createStoreClient( config.destination, { scanPageLimit: config.scanPageLimit } );

    const events = new MigrationEvents();

    attachConsoleReporter( events );

    let succeeded = true;

    switch ( commandAction ) {
        case "@dynamodb-list-tables": {
            const tableNames = await source.list();

            if ( ! tableNames.length ) {
                console.log( "No tables found." );
                return;
            }

            console.log( tableNames.join( ", " ) );
            break;
        }

        case "@dynamodb-copy-schema":
            succeeded = await dynamoDBcopySchema( source, destination, getCommandArguments( commandIndex ), events );
            break;

        case "@dynamodb-migrate-data":
            succeeded = await dynamoDBmigrateData( source, destination, config, getCommandArguments( commandIndex ), events );
            break;

        case "@dynamodb-migrate": {
            const tableNames = getCommandArguments( commandIndex );

            const schemaCopied = await dynamoDBcopySchema( source, destination, tableNames, events );
            const dataMigrated = await dynamoDBmigrateData( source, destination, config, tableNames, events );

            succeeded = schemaCopied && dataMigrated;
            break;
        }

        case "@dynamodb-count-items":
            await dynamoDBcountItems( [ source, destination ], commandIndex );
            break;

        default:
            console.error( "Unknown command: " + commandAction );
            succeeded = false;
    }

    if ( ! succeeded ) {
        process.exitCode = 1;
    }
}

await main().catch( ( error: unknown ) => {
    console.error( error );
    process.exitCode = 1;
} );
