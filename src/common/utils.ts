export function chunkArray<T>( array: readonly T[], size: number ): T[][] {
    if ( ! Number.isInteger( size ) || size < 1 ) {
        throw new RangeError( `Chunk size must be a positive integer, got: ${ size }` );
    }

    return Array.from( { length: Math.ceil( array.length / size ) }, ( _, i ) =>
        array.slice( i * size, i * size + size )
    );
}

export function delay( ms: number ): Promise<void> {
    return new Promise( ( resolve ) => setTimeout( resolve, ms ) );
}
