import { describe, expect, it, vi } from 'vitest';
import { AnalysisContextError } from '../../context';
import { StitchBackend, StitchSession } from '../stitcher';

const MERGED = JSON.stringify({ nodeType: 'SourceUnit', id: 0, nodes: [] });

function fakeBackend(result: () => string | null): StitchBackend {
    return {
        stitchIntoSource: vi.fn(result),
        stitchIntoAst: vi.fn(result)
    };
}

describe('StitchSession', () => {
    it('hands the fragment and target to the backend', () => {
        const backend = fakeBackend(() => MERGED);
        const session = new StitchSession(backend, 'function extra() public {}');

        expect(session.stitchIntoSource('contract C {}', 'Test.sol', 'C')).toBe(MERGED);
        expect(backend.stitchIntoSource).toHaveBeenCalledWith('function extra() public {}', 'contract C {}', 'Test.sol', 'C');

        expect(session.stitchIntoAst('{}')).toBe(MERGED);
        expect(backend.stitchIntoAst).toHaveBeenCalledWith('function extra() public {}', '{}', null);
    });

    it('defaults the unit name and contract', () => {
        const backend = fakeBackend(() => MERGED);
        new StitchSession(backend, 'uint256 extra;').stitchIntoSource('contract C {}');

        expect(backend.stitchIntoSource).toHaveBeenCalledWith('uint256 extra;', 'contract C {}', 'Contract.sol', null);
    });

    it('passes a failed stitch through as null', () => {
        const session = new StitchSession(fakeBackend(() => null), 'uint256 extra;');
        expect(session.stitchIntoSource('contract C {}')).toBeNull();
    });

    it('turns a throwing backend into null and logs it', () => {
        const failure = new Error('merge failed');
        const logger = { debug: vi.fn(), warn: vi.fn() };
        const session = new StitchSession(
            fakeBackend(() => {
                throw failure;
            }),
            'uint256 extra;',
            logger
        );

        expect(session.stitchIntoAst('{}')).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith('Stitch request failed:', failure);
    });

    it('drops results that are not source unit documents', () => {
        const logger = { debug: vi.fn(), warn: vi.fn() };
        const notAUnit = new StitchSession(fakeBackend(() => '{"nodeType": "ContractDefinition"}'), 'x', logger);
        const malformed = new StitchSession(fakeBackend(() => '{"nodeType": '), 'x', logger);

        expect(notAUnit.stitchIntoAst('{}')).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith('Stitch backend returned a document that is not a source unit');
        expect(malformed.stitchIntoAst('{}')).toBeNull();
    });

    it('refuses every call once destroyed', () => {
        const session = new StitchSession(fakeBackend(() => MERGED), 'x');
        session.destroy();

        expect(() => session.stitchIntoSource('contract C {}')).toThrow(AnalysisContextError);
        expect(() => session.stitchIntoAst('{}')).toThrow('Stitch session has been destroyed.');
        expect(() => session.destroy()).toThrow('Stitch session has been destroyed.');
    });
});
