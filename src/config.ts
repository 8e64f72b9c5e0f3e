import process from "node:process";

import { DEFAULT_EXCLUDED_TABLES, DYNAMODB_MAX_BATCH_WRITE_ITEMS } from "./dynamo-db/dynamo-db-defs";
import { DEFAULT_RETRY_BASE_DELAY_MS, type IRetryOptions } from "./migration/batch-writer";
import { ConfigError } from "./migration/migration-errors";

export interface IStoreConfig {
    region: string;
    endpoint?: string;
    credentials?: {
        accessKeyId: string;
        secretAccessKey: string;
    };
}

export interface IMigrationConfig {
    source: IStoreConfig;
    destination: IStoreConfig;
    excludedTables: string[];
    batchSize: number;
    scanPageLimit?: number;
    retry: IRetryOptions;
}

type TEnv = Record<string, string | undefined>;

interface INumberRule {
    integer?: boolean;
    min: number;
    max?: number;
}

function readNumber( env: TEnv, variable: string, rule: INumberRule ): number | undefined {
    const raw = env[ variable ]?.trim();

    if ( ! raw ) {
        return undefined;
    }

    const value = Number( raw );

    if ( Number.isNaN( value ) || ( rule.integer && ! Number.isInteger( value ) ) ) {
        throw new ConfigError( variable, `expected ${ rule.integer ? 'an integer' : 'a number' }, got "${ raw }"` );
    }

    if ( value < rule.min || ( undefined !== rule.max && value > rule.max ) ) {
        throw new ConfigError( variable, `expected a value between ${ rule.min } and ${ rule.max ?? 'Infinity' }, got ${ value }` );
    }

    return value;
}

function readStore( env: TEnv, prefix: string ): IStoreConfig {
    const {
        [ `${ prefix }_REGION` ]: region = "us-east-1",
        [ `${ prefix }_ENDPOINT` ]: endpoint,
        [ `${ prefix }_ACCESS_KEY_ID` ]: accessKeyId,
        [ `${ prefix }_SECRET_ACCESS_KEY` ]: secretAccessKey,
    } = env;

    const store: IStoreConfig = { region };

    if ( endpoint ) {
        store.endpoint = endpoint;
    }

    if ( accessKeyId && secretAccessKey ) {
        store.credentials = { accessKeyId, secretAccessKey };
    } else if ( accessKeyId || secretAccessKey ) {
        throw new ConfigError(
            accessKeyId ? `${ prefix }_SECRET_ACCESS_KEY` : `${ prefix }_ACCESS_KEY_ID`,
            'access key id and secret access key must be set together'
        );
    }

    return store;
}

export function loadMigrationConfig( env: TEnv = process.env ): IMigrationConfig {
    const { MIGRATE_EXCLUDE_TABLES } = env;

    const excludedTables = undefined === MIGRATE_EXCLUDE_TABLES
        ? [ ... DEFAULT_EXCLUDED_TABLES ]
        : MIGRATE_EXCLUDE_TABLES.split( ',' )
            .map( ( tableName ) => tableName.trim() )
            .filter( ( tableName ) => tableName.length > 0 );

    const config: IMigrationConfig = {
        source: readStore( env, 'MIGRATE_SOURCE' ),
        destination: readStore( env, 'MIGRATE_DESTINATION' ),
        excludedTables,
        batchSize: readNumber( env, 'MIGRATE_BATCH_SIZE', {
            integer: true,
            min: 1,
            max: DYNAMODB_MAX_BATCH_WRITE_ITEMS
        } ) ?? DYNAMODB_MAX_BATCH_WRITE_ITEMS,
        retry: {
            baseDelayMs: readNumber( env, 'MIGRATE_RETRY_BASE_DELAY_MS', { min: 1 } ) ?? DEFAULT_RETRY_BASE_DELAY_MS,
            maxDelayMs: readNumber( env, 'MIGRATE_RETRY_MAX_DELAY_MS', { min: 1 } ) ?? Infinity,
            maxAttempts: readNumber( env, 'MIGRATE_RETRY_MAX_ATTEMPTS', { integer: true, min: 0 } ) ?? Infinity,
            maxElapsedMs: readNumber( env, 'MIGRATE_RETRY_MAX_ELAPSED_MS', { min: 0 } ) ?? Infinity,
        },
    };

    const scanPageLimit = readNumber( env, 'MIGRATE_SCAN_PAGE_LIMIT', { integer: true, min: 1 } );

    if ( undefined !== scanPageLimit ) {
        config.scanPageLimit = scanPageLimit;
    }

    return config;
}
