import { describe, expect, it, vi } from 'vitest';
import { AnalysisContext, AnalysisContextError } from '../context';
import { PipelineState } from '../analyzer/pipeline';
import { HEADER } from '../analyzer/__tests__/helpers';
import { Logger } from '../config';

const COUNTER = `${HEADER}contract Counter {
    uint256 public count;
    function increment() public { count += 1; }
}`;

function createContext(logger: Logger = { debug: vi.fn(), warn: vi.fn() }): AnalysisContext {
    return AnalysisContext.create({ sourceUnitName: 'Test.sol', logger });
}

describe('AnalysisContext', () => {
    it('parses and analyses a source unit', () => {
        const context = createContext();
        const parsed = context.parse(COUNTER);
        expect(parsed).not.toBeNull();
        expect(parsed).not.toContain('typeDescriptions');

        const analysed = parsed === null ? null : context.analyze(parsed);
        expect(analysed).toContain('"typeString": "uint256"');
        expect(context.getErrors()).toBeNull();
        expect(context.lastAnalysis?.state).toBe(PipelineState.Succeeded);
    });

    it('returns null with a parser error for bad syntax', () => {
        const context = createContext();

        expect(context.parse(`${HEADER}contract C {`)).toBeNull();
        expect(context.diagnostics.map(d => d.kind)).toEqual(['ParserError']);
    });

    it('ignores reference ids written into an analysed document', () => {
        const context = createContext();
        const parsed = context.parse(COUNTER);
        const analysed = parsed === null ? null : context.analyze(parsed);
        if (analysed === null) {
            throw new Error('Counter did not analyse.');
        }
        const tampered = analysed.replace(/"referencedDeclaration": \d+/g, '"referencedDeclaration": 999');

        expect(tampered).not.toBe(analysed);
        expect(context.analyze(tampered)).toBe(analysed);
    });

    it('returns null and keeps the diagnostics of a degraded analysis', () => {
        const context = createContext();
        const parsed = context.parse(`${HEADER}contract C { function f() {} }`);

        expect(parsed === null ? 'unparsed' : context.analyze(parsed)).toBeNull();
        expect(context.getErrors()).toBe('SyntaxError: No visibility specified. Did you intend to add "public"?\n');
        expect(context.lastAnalysis?.state).toBe(PipelineState.Degraded);
    });

    it('exports nothing when a contract-level check fails', () => {
        const context = createContext();
        const parsed = context.parse(
            `${HEADER}contract A { function f() public {} }\ncontract B is A { function f() public override {} }`
        );

        expect(parsed === null ? 'unparsed' : context.analyze(parsed)).toBeNull();
        expect(context.lastAnalysis?.state).toBe(PipelineState.Degraded);
        expect(context.lastAnalysis?.unit?.annotations.deployedCallGraph.size).toBe(0);
    });

    it('returns null without diagnostics for a document it cannot read', () => {
        const logger = { debug: vi.fn(), warn: vi.fn() };
        const context = createContext(logger);

        expect(context.analyze('not json')).toBeNull();
        expect(context.getErrors()).toBeNull();
        expect(context.lastAnalysis).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith('Failed to import Test.sol:', expect.any(String));
    });

    it('starts each call with fresh diagnostics', () => {
        const context = createContext();
        context.parse(`${HEADER}contract C {`);
        context.parse(COUNTER);

        expect(context.getErrors()).toBeNull();
    });

    it('refuses every call once destroyed', () => {
        const context = createContext();
        context.destroy();

        expect(() => context.parse(COUNTER)).toThrow(AnalysisContextError);
        expect(() => context.getErrors()).toThrow('Analysis context has been destroyed.');
        expect(() => context.destroy()).toThrow('Analysis context has been destroyed.');
    });

    it('refuses to be re-entered from inside a call', () => {
        const reentered: { error: unknown } = { error: null };
        let context: AnalysisContext | null = null;
        const logger = {
            debug: vi.fn(),
            warn: vi.fn(() => {
                if (context === null || reentered.error !== null) return;
                try {
                    context.parse(COUNTER);
                } catch (error) {
                    reentered.error = error;
                }
            })
        };
        context = createContext(logger);

        expect(context.analyze('not json')).toBeNull();
        expect(reentered.error).toBeInstanceOf(AnalysisContextError);
        expect(reentered.error instanceof Error ? reentered.error.message : null).toBe('Analysis context is already in use.');
        expect(context.parse(COUNTER)).not.toBeNull();
    });
});
