import { describe, it } from "node:test";
import assert from "node:assert";

import type { IScanPage, IStoreClient, TDynamoDBCursor, TDynamoDBItem } from "../src/dynamo-db/dynamo-db-defs";
import { MigrationEvents, type TMigrationEventName } from "../src/migration/migration-events";
import { synchronizeTable } from "../src/migration/table-synchronizer";
import { InMemoryStoreClient, stringItem, stringItems } from "./support/in-memory-store-client";

/**
 * Serves a fixed sequence of pages, whatever cursor it is asked for.
 */
class ScriptedStoreClient implements IStoreClient {
    public readonly scanCursors: Array<TDynamoDBCursor | undefined> = [];
    public readonly written: TDynamoDBItem[][] = [];

    public constructor( public readonly label: string, private readonly pages: IScanPage[] ) {
    }

    public async list() {
        return [ "Users" ];
    }

    public async describe(): Promise<never> {
        throw new Error( "Not supported" );
    }

    public async create(): Promise<void> {
        throw new Error( "Not supported" );
    }

    public async scan( _tableName: string, cursor?: TDynamoDBCursor ): Promise<IScanPage> {
        const page = this.pages[ this.scanCursors.length ];

        this.scanCursors.push( cursor );

        if ( ! page ) {
            throw new Error( `Unexpected scan #${ this.scanCursors.length }` );
        }

        return page;
    }

    public async batchWrite( _tableName: string, items: TDynamoDBItem[] ) {
        this.written.push( items );
        return [];
    }
}

function recordEvents( events: MigrationEvents, names: TMigrationEventName[] ) {
    const log: string[] = [];

    for ( const name of names ) {
        events.on( name, ( payload ) => log.push( `${ name } ${ 'page' in payload ? payload.page : '' }`.trim() ) );
    }

    return log;
}

function key( id: string ): TDynamoDBCursor {
    return { id: { S: id } };
}

describe( "synchronizeTable", () => {
    it( "should copy a whole table into an empty destination", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 30 ) );
        const destination = new InMemoryStoreClient( "destination" ).addTable( "Users" );

        const result = await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 3,
            itemsWritten: 30,
            failedBatches: 0
        } );
        assert.deepStrictEqual( destination.getItems( "Users" ), stringItems( 1, 30 ) );
        // The destination is empty, so it is only scanned once.
        assert.strictEqual( destination.scanCalls.length, 1 );
    } );

    it( "should write nothing on a second run", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 30 ) );
        const destination = new InMemoryStoreClient( "destination" ).addTable( "Users" );

        await synchronizeTable( "Users", source, destination );

        const writesAfterFirstRun = destination.batchWriteCalls.length;
        const result = await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 3,
            itemsWritten: 0,
            failedBatches: 0
        } );
        assert.strictEqual( destination.batchWriteCalls.length, writesAfterFirstRun );
    } );

    it( "should skip aligned pages and copy the missing tail", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 30 ) );
        const destination = new InMemoryStoreClient( "destination" ).addTable( "Users", stringItems( 1, 20 ) );
        const events = new MigrationEvents();
        const log = recordEvents( events, [ 'page:identical', 'page:diff', 'page:tail' ] );

        const result = await synchronizeTable( "Users", source, destination, { events } );

        assert.deepStrictEqual( log, [ 'page:identical 1', 'page:identical 2', 'page:tail 3' ] );
        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 3,
            itemsWritten: 10,
            failedBatches: 0
        } );
        assert.deepStrictEqual( destination.batchWriteCalls.map( ( call ) => call.items ), [ stringItems( 21, 30 ) ] );
        assert.deepStrictEqual( destination.getItems( "Users" ), stringItems( 1, 30 ) );
    } );

    it( "should diff a lockstep page that differs from the destination", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 30 ) );
        const destination = new InMemoryStoreClient( "destination" ).addTable( "Users", [
            ... stringItems( 1, 10 ),
            stringItem( 15 )
        ] );

        const result = await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( destination.batchWriteCalls.map( ( call ) => call.items ), [
            [ ... stringItems( 11, 14 ), ... stringItems( 16, 20 ) ],
            stringItems( 21, 30 )
        ] );
        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 3,
            itemsWritten: 19,
            failedBatches: 0
        } );
        assert.deepStrictEqual( destination.getItems( "Users" ), stringItems( 1, 30 ) );
    } );

    it( "should switch to tail copy once the cursors diverge", async () => {
        const source = new ScriptedStoreClient( "source", [
            { items: stringItems( 1, 3 ), cursor: key( "source-1" ) },
            { items: stringItems( 4, 6 ), cursor: key( "source-2" ) },
            { items: stringItems( 7, 8 ) },
        ] );
        const destination = new ScriptedStoreClient( "destination", [
            { items: stringItems( 1, 3 ), cursor: key( "destination-1" ) },
        ] );

        const result = await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( source.scanCursors, [ undefined, key( "source-1" ), key( "source-2" ) ] );
        assert.deepStrictEqual( destination.scanCursors, [ undefined ] );
        assert.deepStrictEqual( destination.written, [ stringItems( 4, 6 ), stringItems( 7, 8 ) ] );
        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 3,
            itemsWritten: 5,
            failedBatches: 0
        } );
    } );

    it( "should advance both scans with their own cursors while they match", async () => {
        const source = new ScriptedStoreClient( "source", [
            { items: stringItems( 1, 2 ), cursor: key( "a" ) },
            { items: stringItems( 3, 4 ), cursor: key( "b" ) },
            { items: stringItems( 5, 6 ) },
        ] );
        const destination = new ScriptedStoreClient( "destination", [
            { items: stringItems( 1, 2 ), cursor: key( "a" ) },
            { items: [ stringItem( 3 ) ], cursor: key( "c" ) },
        ] );

        await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( destination.scanCursors, [ undefined, key( "a" ) ] );
        assert.deepStrictEqual( destination.written, [ [ stringItem( 4 ) ], stringItems( 5, 6 ) ] );
    } );

    it( "should return without writing when the destination table is missing", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 5 ) );
        const destination = new InMemoryStoreClient( "destination" );
        const events = new MigrationEvents();
        const notFound: string[] = [];

        events.on( 'table:not-found', ( { table, store } ) => notFound.push( `${ table }@${ store }` ) );

        const result = await synchronizeTable( "Users", source, destination, { events } );

        assert.deepStrictEqual( result, { tableName: "Users", status: "not-found", store: "destination" } );
        assert.deepStrictEqual( notFound, [ "Users@destination" ] );
        assert.strictEqual( destination.batchWriteCalls.length, 0 );
    } );

    it( "should propagate other scan errors", async () => {
        const source = new InMemoryStoreClient( "source" ).addTable( "Users", stringItems( 1, 5 ) );
        const destination = new InMemoryStoreClient( "destination" ).addTable( "Users" );
        const throttled = new Error( "Throughput exceeded" );

        destination.failScans( "Users", throttled );

        await assert.rejects( synchronizeTable( "Users", source, destination ), throttled );
    } );

    it( "should count batches that failed to write", async () => {
        const source = new InMemoryStoreClient( "source", 40 ).addTable( "Users", stringItems( 1, 30 ) );
        const destination = new InMemoryStoreClient( "destination", 40 ).addTable( "Users" );

        destination.failNextWrite( new Error( "Connection reset" ) );

        const result = await synchronizeTable( "Users", source, destination );

        assert.deepStrictEqual( result, {
            tableName: "Users",
            status: "synced",
            pages: 1,
            itemsWritten: 5,
            failedBatches: 1
        } );
        assert.deepStrictEqual( destination.getItems( "Users" ), stringItems( 26, 30 ) );
    } );
} );
