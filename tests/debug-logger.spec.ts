import { describe, it } from "node:test";
import assert from "node:assert";

import { DebugLogger, parsePatterns } from "../src/common/debug-logger";

describe( "DebugLogger", () => {
    it( "should parse a comma separated, case insensitive pattern list", () => {
        assert.deepStrictEqual( parsePatterns( " Migration:* ,, -migration:Batch " ), [ "migration:*", "-migration:batch" ] );
        assert.deepStrictEqual( parsePatterns( undefined ), [] );
    } );

    it( "should enable loggers by namespace wildcard", () => {
        const patterns = parsePatterns( "migration:*" );

        assert.strictEqual( DebugLogger.isEnabled( "migration:coordinator", patterns ), true );
        assert.strictEqual( DebugLogger.isEnabled( "dynamodb:client", patterns ), false );
    } );

    it( "should enable loggers by exact name", () => {
        const patterns = parsePatterns( "dynamodb:client" );

        assert.strictEqual( DebugLogger.isEnabled( "dynamodb:client", patterns ), true );
        assert.strictEqual( DebugLogger.isEnabled( "dynamodb:schema", patterns ), false );
    } );

    it( "should let an explicit exclusion win", () => {
        const patterns = parsePatterns( "migration:*, -migration:batch" );

        assert.strictEqual( DebugLogger.isEnabled( "migration:batch-writer", patterns ), false );
        assert.strictEqual( DebugLogger.isEnabled( "migration:table-synchronizer", patterns ), true );
    } );

    it( "should enable nothing without patterns", () => {
        assert.strictEqual( DebugLogger.isEnabled( "migration:coordinator", [] ), false );
    } );

    it( "should reject names without an entity", () => {
        assert.throws( () => DebugLogger.create( "migration" ), /use namespace:entity/ );
    } );
} );
