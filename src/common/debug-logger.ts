import * as Console from "node:console";
import process from 'node:process';

export type TDebugCallback = ( callback: () => unknown[] ) => void;

export function parsePatterns( value: string | undefined ): string[] {
    return ( value ?? '' )
        .toLowerCase()
        .split( ',' )
        .map( ( entity: string ) => entity.trim() )
        .filter( ( entity: string ) => entity.length > 0 );
}

const entitiesPatterns = parsePatterns( process.env.DEBUG_MODULES );

export class DebugLogger extends Console.Console {
    private static instances: Record<string, DebugLogger> = {};

    /**
     * Patterns default to the ones read from `DEBUG_MODULES` at startup.
     */
    public static isEnabled( entityName: string, patterns: readonly string[] = entitiesPatterns ): boolean {
        const entityPattern = entityName.toLowerCase();

        // Check for explicit disabling via `-namespace`.
        const isExplicitlyDisabled = patterns.some(
            ( pattern: string ) =>
                pattern.startsWith( '-' ) &&
                entityPattern.startsWith( pattern.slice( 1 ) )
        );

        if ( isExplicitlyDisabled ) {
            return false;
        }

        // Check for enabling via 'namespace:*' or exact match
        return patterns.some( ( pattern ) => {
            if ( pattern.endsWith( '*' ) ) {
                return entityPattern.startsWith( pattern.slice( 0, -1 ) );
            }

            return pattern === entityPattern;
        } );
    }

    public static create( name: string ): TDebugCallback {
        const [ namespaceName, entityName ] = name.split( ':' );

        if ( ! namespaceName || ! entityName ) {
            throw new Error(
                `Invalid namespace name: ${ name }, use namespace:entity`
            );
        }

        if ( ! this.isEnabled( name ) ) {
            return () => {
            };
        }

        if ( ! this.instances[ name ] ) {
            this.instances[ name ] = new this( process.stderr );
        }

        return this.instances[ name ].createCallback( name );
    }

    createCallback( entityName: string ): TDebugCallback {
        return ( callback: () => unknown[] ) => {
            const args = callback();

            if ( 'string' === typeof args[ 0 ] ) {
                if ( args.length === 1 ) {
                    this.debug( entityName + ' -> ' + args[ 0 ] );
                    return;
                }

                this.debug( entityName + ' -> ' + args[ 0 ], {
                    args: args.slice( 1 )
                } );
                return;
            }

            this.debug( entityName, { args } );
        };
    }
}
