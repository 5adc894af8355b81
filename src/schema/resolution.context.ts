import * as path from 'node:path';

/**
 * Handle returned by ResolutionContext.enter; release() restores the
 * base that was current when the scope was entered.
 */
export interface ResolutionScope {
    readonly baseDir: string;
    release(): void;
}

/**
 * Resolution Context
 *
 * Holds the base directory against which relative `path` fields are
 * resolved. Scopes nest; each release restores the previous base.
 */
export class ResolutionContext {
    private base: string | undefined;

    /**
     * Current base directory, or the working directory outside any scope
     */
    get current(): string {
        return this.base ?? process.cwd();
    }

    /**
     * Whether a scope is active
     */
    get active(): boolean {
        return this.base !== undefined;
    }

    enter(baseDir: string): ResolutionScope {
        const previous = this.base;
        const resolved = path.resolve(this.current, baseDir);
        let released = false;

        this.base = resolved;

        return {
            baseDir: resolved,
            release: () => {
                if (released) return;
                released = true;
                this.base = previous;
            },
        };
    }

    /**
     * Run `fn` with `baseDir` as the base, restoring the previous base on every exit path
     */
    run<T>(baseDir: string, fn: (baseDir: string) => T): T {
        const scope = this.enter(baseDir);
        try {
            return fn(scope.baseDir);
        } finally {
            scope.release();
        }
    }
}

// Singleton instance
export const resolutionContext = new ResolutionContext();
