import { isDeepStrictEqual } from "node:util";

import type { AttributeValue } from "@aws-sdk/client-dynamodb";

import type { TDynamoDBCursor, TDynamoDBItem } from "../dynamo-db/dynamo-db-defs";

function compareBinary( a: Uint8Array, b: Uint8Array ): number {
    return Buffer.compare( a, b );
}

/**
 * `SS`, `NS` and `BS` are unordered, their members are sorted at every depth.
 */
function normalizeAttribute( value: AttributeValue ): AttributeValue {
    if ( value.SS ) {
        return { SS: [ ... value.SS ].sort() };
    }

    if ( value.NS ) {
        return { NS: [ ... value.NS ].sort() };
    }

    if ( value.BS ) {
        return { BS: [ ... value.BS ].sort( compareBinary ) };
    }

    if ( value.M ) {
        return { M: normalizeItem( value.M ) };
    }

    if ( value.L ) {
        return { L: value.L.map( normalizeAttribute ) };
    }

    return value;
}

function normalizeItem( item: TDynamoDBItem ): TDynamoDBItem {
    return Object.fromEntries(
        Object.entries( item ).map( ( [ name, value ] ): [ string, AttributeValue ] => [ name, normalizeAttribute( value ) ] )
    );
}

/**
 * Full structural equality, attribute order and the order of set members are irrelevant.
 */
export function itemsEqual( a: TDynamoDBItem, b: TDynamoDBItem ): boolean {
    return isDeepStrictEqual( normalizeItem( a ), normalizeItem( b ) );
}

/**
 * Two pages are equal when they hold equal items in the same order.
 */
export function pagesEqual( source: readonly TDynamoDBItem[], destination: readonly TDynamoDBItem[] ): boolean {
    if ( source.length !== destination.length ) {
        return false;
    }

    return source.every( ( item, index ) => itemsEqual( item, destination[ index ] ) );
}

export function cursorsEqual( a: TDynamoDBCursor | undefined, b: TDynamoDBCursor | undefined ): boolean {
    if ( ! a || ! b ) {
        return false;
    }

    return isDeepStrictEqual( a, b );
}

/**
 * Items of `source` absent from `destination`.
 *
 * Membership uses `itemsEqual`, duplicates inside `source` are kept and not collapsed.
 */
export function diff( source: readonly TDynamoDBItem[], destination: readonly TDynamoDBItem[] ): TDynamoDBItem[] {
    if ( ! destination.length ) {
        return [ ... source ];
    }

    const candidates = destination.map( normalizeItem );

    return source.filter( ( item ) => {
        const normalized = normalizeItem( item );

        return ! candidates.some( ( candidate ) => isDeepStrictEqual( normalized, candidate ) );
    } );
}
