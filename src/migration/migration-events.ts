import { EventEmitter } from "node:events";

export interface IMigrationEventMap {
    'table:start': { table: string; source: string; destination: string };
    'table:not-found': { table: string; store: string };
    'table:empty': { table: string; page: number };
    'table:done': { table: string; pages: number; itemsWritten: number };
    'table:failed': { table: string; error: unknown };
    'page:identical': { table: string; page: number };
    'page:diff': { table: string; page: number; sourceCount: number; missingCount: number };
    'page:tail': { table: string; page: number; count: number };
    'batch:written': { table: string; page: number; batch: number; totalBatches: number; count: number };
    'batch:failed': { table: string; page: number; batch: number; totalBatches: number; error: unknown };
    'batch:retry': { table: string; page: number; batch: number; attempt: number; delayMs: number; unprocessedCount: number };
    'schema:created': { table: string; store: string };
    'schema:exists': { table: string; store: string };
    'schema:failed': { table: string; store: string; error: unknown };
}

export type TMigrationEventName = keyof IMigrationEventMap;

export type TMigrationListener<K extends TMigrationEventName> = ( payload: IMigrationEventMap[K] ) => void;

/**
 * Progress stream of a migration, keyed by table, page and batch.
 */
export class MigrationEvents {
    private readonly emitter = new EventEmitter();

    public on<K extends TMigrationEventName>( event: K, listener: TMigrationListener<K> ): this {
        this.emitter.on( event, listener );
        return this;
    }

    public off<K extends TMigrationEventName>( event: K, listener: TMigrationListener<K> ): this {
        this.emitter.off( event, listener );
        return this;
    }

    public emit<K extends TMigrationEventName>( event: K, payload: IMigrationEventMap[K] ): boolean {
        return this.emitter.emit( event, payload );
    }
}
