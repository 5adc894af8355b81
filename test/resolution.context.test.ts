import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ResolutionContext } from '../src/schema/index.js';

describe('ResolutionContext', () => {
    it('falls back to the working directory outside any scope', () => {
        const context = new ResolutionContext();

        expect(context.active).toBe(false);
        expect(context.current).toBe(process.cwd());
    });

    it('restores the previous base when nested scopes are released', () => {
        const context = new ResolutionContext();
        const outer = context.enter('/data/outer');
        const inner = context.enter('nested');

        expect(inner.baseDir).toBe(path.resolve('/data/outer', 'nested'));
        expect(context.current).toBe(inner.baseDir);

        inner.release();
        expect(context.current).toBe(path.resolve('/data/outer'));

        outer.release();
        expect(context.active).toBe(false);
    });

    it('ignores a second release', () => {
        const context = new ResolutionContext();
        const outer = context.enter('/data/outer');
        const inner = context.enter('/data/inner');

        inner.release();
        inner.release();

        expect(context.current).toBe(outer.baseDir);
    });

    it('restores the base when the scoped function throws', () => {
        const context = new ResolutionContext();

        expect(() =>
            context.run('/data/failing', () => {
                throw new Error('boom');
            })
        ).toThrow('boom');
        expect(context.active).toBe(false);
    });

    it('passes the resolved base to the scoped function', () => {
        const context = new ResolutionContext();

        expect(context.run('/data/run', (baseDir) => baseDir)).toBe(path.resolve('/data/run'));
    });
});
