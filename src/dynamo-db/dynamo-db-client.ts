import {
    BatchWriteItemCommand,
    CreateTableCommand,
    type CreateTableCommandInput,
    DescribeTableCommand,
    DynamoDBClient as DynamoDBClientInternal,
    type DynamoDBClientConfig,
    ListTablesCommand,
    type ListTablesCommandOutput,
    ResourceInUseException,
    ResourceNotFoundException,
    ScanCommand,
    type ScanCommandInput,
    type TableDescription,
    type WriteRequest,
    waitUntilTableExists,
} from "@aws-sdk/client-dynamodb";

import * as util from "node:util";

import { DebugLogger } from "../common/debug-logger";
import type { IStoreConfig } from "../config";
import { BatchSizeError, TableExistsError, TableNotFoundError } from "../migration/migration-errors";
import {
    DYNAMODB_MAX_BATCH_WRITE_ITEMS,
    type IScanPage,
    type IStoreClient,
    type TDynamoDBCursor,
    type TDynamoDBItem,
} from "./dynamo-db-defs";

const debug = DebugLogger.create( 'dynamodb:client' );

export interface IDynamoDBStoreClientOptions {
    label?: string;
    /**
     * `Limit` passed to every scan, the page size is otherwise decided by the service (1MB).
     */
    scanPageLimit?: number;
    /**
     * Seconds to wait for a created table to become `ACTIVE`, `0` returns right after the request.
     */
    createWaitSeconds?: number;
}

export class DynamoDBStoreClient implements IStoreClient {
    public readonly label: string;

    private readonly scanPageLimit: number | undefined;
    private readonly createWaitSeconds: number;

    /**
     * Uses the default credential chain (environment, `AWS_PROFILE`, instance metadata).
     */
    public static aws(
        region: string,
        endpoint?: string,
        options: IDynamoDBStoreClientOptions = {}
    ) {
        const config: DynamoDBClientConfig = { region };

        if ( endpoint ) {
            config.endpoint = endpoint;
        }

        return new DynamoDBStoreClient( new DynamoDBClientInternal( config ), { label: region, ... options } );
    }

    public static awsWithCredentials(
        region: string,
        credentials: {
            accessKeyId: string,
            secretAccessKey: string,
        },
        endpoint?: string,
        options: IDynamoDBStoreClientOptions = {}
    ) {
        const config: DynamoDBClientConfig = { region, credentials };

        if ( endpoint ) {
            config.endpoint = endpoint;
        }

        return new DynamoDBStoreClient( new DynamoDBClientInternal( config ), { label: region, ... options } );
    }

    public constructor( private readonly client: DynamoDBClientInternal, options: IDynamoDBStoreClientOptions = {} ) {
        this.label = options.label ?? "dynamodb";
        this.scanPageLimit = options.scanPageLimit;
        this.createWaitSeconds = options.createWaitSeconds ?? 300;
    }

    public async list(): Promise<string[]> {
        const allTableNames: string[] = [];
        let lastEvaluatedTableName: string | undefined = undefined;

        do {
            const command: ListTablesCommand = new ListTablesCommand( {
                ExclusiveStartTableName: lastEvaluatedTableName
            } );

            debug( () => [ `Listing tables in ${ this.label }...`, { lastEvaluatedTableName } ] );

            const response: ListTablesCommandOutput = await this.client.send( command );

            if ( response.TableNames ) {
                allTableNames.push( ... response.TableNames );
            }

            lastEvaluatedTableName = response.LastEvaluatedTableName;
        } while ( lastEvaluatedTableName );

        debug( () => [
            'Tables found:',
            util.inspect( allTableNames, { compact: true } )
        ] );

        return allTableNames;
    }

    public async describe( tableName: string ): Promise<TableDescription> {
        debug( () => [ `Describing table: ${ tableName }` ] );

        const { Table } = await this.withNotFound( tableName, () =>
            this.client.send( new DescribeTableCommand( { TableName: tableName } ) )
        );

        if ( ! Table ) {
            throw new TableNotFoundError( tableName, this.label );
        }

        return Table;
    }

    public async create( input: CreateTableCommandInput ): Promise<void> {
        debug( () => [ `Creating table: ${ input.TableName }` ] );

        const tableName = input.TableName ?? '';

        const response = await this.client.send( new CreateTableCommand( input ) ).catch( ( error: unknown ) => {
            if ( error instanceof ResourceInUseException ) {
                throw new TableExistsError( tableName, this.label, { cause: error } );
            }

            throw error;
        } );

        debug( () => [ `Table ${ input.TableName } created, status: ${ response.TableDescription?.TableStatus }` ] );

        if ( ! this.createWaitSeconds || response.TableDescription?.TableStatus === 'ACTIVE' ) {
            return;
        }

        debug( () => [ `Ensuring table ${ input.TableName } is active with timeout ${ this.createWaitSeconds }s...` ] );

        await waitUntilTableExists(
            { client: this.client, maxWaitTime: this.createWaitSeconds },
            { TableName: input.TableName }
        );
    }

    public async scan( tableName: string, cursor?: TDynamoDBCursor ): Promise<IScanPage> {
        const input: ScanCommandInput = {
            TableName: tableName,
        };

        if ( cursor ) {
            input.ExclusiveStartKey = cursor;
        }

        if ( this.scanPageLimit ) {
            input.Limit = this.scanPageLimit;
        }

        const response = await this.withNotFound( tableName, () =>
            this.client.send( new ScanCommand( input ) )
        );

        debug( () => [
            `Scanned table: ${ tableName } in ${ this.label }, items: ${ response.Items?.length ?? 0 }, has more: ${ !! response.LastEvaluatedKey }`
        ] );

        const page: IScanPage = {
            items: response.Items ?? [],
        };

        if ( response.LastEvaluatedKey ) {
            page.cursor = response.LastEvaluatedKey;
        }

        return page;
    }

    public async batchWrite( tableName: string, items: TDynamoDBItem[] ): Promise<TDynamoDBItem[]> {
        if ( items.length > DYNAMODB_MAX_BATCH_WRITE_ITEMS ) {
            throw new BatchSizeError( items.length, DYNAMODB_MAX_BATCH_WRITE_ITEMS );
        }

        if ( ! items.length ) {
            return [];
        }

        const requests: WriteRequest[] = items.map( ( item ) => ( { PutRequest: { Item: item } } ) );

        const response = await this.client.send( new BatchWriteItemCommand( {
            RequestItems: { [ tableName ]: requests }
        } ) );

        const unprocessed = ( response.UnprocessedItems?.[ tableName ] ?? [] )
            .flatMap( ( request ) => request.PutRequest?.Item ? [ request.PutRequest.Item ] : [] );

        debug( () => [ `Batch write to ${ tableName }: ${ items.length } sent, ${ unprocessed.length } unprocessed` ] );

        return unprocessed;
    }

    private async withNotFound<T>( tableName: string, request: () => Promise<T> ): Promise<T> {
        try {
            return await request();
        } catch ( error ) {
            if ( error instanceof ResourceNotFoundException ) {
                throw new TableNotFoundError( tableName, this.label, { cause: error } );
            }

            throw error;
        }
    }
}

export function createStoreClient( config: IStoreConfig, options: IDynamoDBStoreClientOptions = {} ) {
    if ( config.credentials ) {
        return DynamoDBStoreClient.awsWithCredentials( config.region, config.credentials, config.endpoint, options );
    }

    return DynamoDBStoreClient.aws( config.region, config.endpoint, options );
}
