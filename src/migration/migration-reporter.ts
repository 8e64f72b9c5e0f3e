import { toErrorMessage } from "./migration-errors";
import type { MigrationEvents, TMigrationEventName, TMigrationListener } from "./migration-events";

export type TReporterOutput = Pick<Console, 'log' | 'error'>;

/**
 * Prints migration progress, returns a function that detaches the reporter.
 */
export function attachConsoleReporter( events: MigrationEvents, output: TReporterOutput = console ): () => void {
    const detachers: Array<() => void> = [];

    function listen<K extends TMigrationEventName>( event: K, listener: TMigrationListener<K> ) {
        events.on( event, listener );
        detachers.push( () => events.off( event, listener ) );
    }

    listen( 'table:start', ( { table, source } ) =>
        output.log( `Scanning table ${ table } in source ${ source }` ) );

    listen( 'table:not-found', ( { table, store } ) =>
        output.log( `${ table } was not found in destination ${ store }` ) );

    listen( 'page:identical', ( { table, page } ) =>
        output.log( `Page ${ page } for Table ${ table } is identical to destination Table` ) );

    listen( 'table:empty', ( { table } ) =>
        output.log( `Table ${ table } is empty!` ) );

    listen( 'batch:written', ( { table, page, batch, totalBatches } ) =>
        output.log( `Page ${ page } Batch ${ batch }/${ totalBatches } for Table ${ table } copied successfully!` ) );

    listen( 'batch:failed', ( { table, page, batch, totalBatches, error } ) =>
        output.error( `Page ${ page } Batch ${ batch }/${ totalBatches } for Table ${ table } failed to copy!: ${ toErrorMessage( error ) }` ) );

    listen( 'table:done', ( { table, pages, itemsWritten } ) =>
        output.log( `Table ${ table } synchronized, pages: ${ pages }, items written: ${ itemsWritten }` ) );

    listen( 'table:failed', ( { table, error } ) =>
        output.error( `Table ${ table } failed: ${ toErrorMessage( error ) }` ) );

    listen( 'schema:created', ( { table } ) =>
        output.log( `Created table ${ table }` ) );

    listen( 'schema:exists', ( { table, store } ) =>
        output.log( `Table ${ table } already exists in ${ store }, skipped` ) );

    listen( 'schema:failed', ( { table, store, error } ) =>
        output.error( `Failed to create table ${ table } in ${ store }: ${ toErrorMessage( error ) }` ) );

    return () => detachers.forEach( ( detach ) => detach() );
}
