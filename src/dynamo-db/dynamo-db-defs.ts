import type {
    AttributeValue,
    CreateTableCommandInput,
    TableDescription
} from '@aws-sdk/client-dynamodb';

/**
 * Maximum number of put requests accepted by a single `BatchWriteItem` call.
 * @see https://docs.aws.amazon.com/amazondynamodb/latest/APIReference/API_BatchWriteItem.html
 */
export const DYNAMODB_MAX_BATCH_WRITE_ITEMS = 25;

/**
 * Operational tables that are never migrated.
 */
export const DEFAULT_EXCLUDED_TABLES: readonly string[] = [
    'Performance',
    'PerformanceMetrics',
    'ProductionPipelineErrors'
];

export type TDynamoDBItem = Record<string, AttributeValue>;

/**
 * Opaque continuation token, the `LastEvaluatedKey` of a scan.
 */
export type TDynamoDBCursor = Record<string, AttributeValue>;

export interface IScanPage {
    items: TDynamoDBItem[];
    cursor?: TDynamoDBCursor;
}

/**
 * Capabilities required from either side of a migration.
 */
export interface IStoreClient {
    /**
     * Human readable location, used in logs, eg: region name.
     */
    readonly label: string;

    list(): Promise<string[]>;

    describe( tableName: string ): Promise<TableDescription>;

    create( input: CreateTableCommandInput ): Promise<void>;

    /**
     * Throws `TableNotFoundError` when the table does not exist.
     */
    scan( tableName: string, cursor?: TDynamoDBCursor ): Promise<IScanPage>;

    /**
     * Returns the items the store did not persist.
     */
    batchWrite( tableName: string, items: TDynamoDBItem[] ): Promise<TDynamoDBItem[]>;
}
