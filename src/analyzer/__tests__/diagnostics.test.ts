import { describe, expect, it } from 'vitest';
import { DiagnosticsSink, FatalError } from '../diagnostics';

describe('DiagnosticsSink', () => {
    it('keeps diagnostics in the order they were reported', () => {
        const sink = new DiagnosticsSink('Test.sol');
        sink.warning('first');
        sink.report('TypeError', 'second');
        sink.report('Info', 'third');

        expect(sink.diagnostics.map(d => d.message)).toEqual(['first', 'second', 'third']);
        expect(sink.diagnostics.map(d => d.severity)).toEqual(['warning', 'error', 'info']);
    });

    it('counts only error-severity diagnostics', () => {
        const sink = new DiagnosticsSink('Test.sol');
        sink.warning('unused variable');
        expect(sink.errorCount).toBe(0);

        sink.report('DeclarationError', 'Undeclared identifier.');
        sink.report('ParserError', 'Expected ;');
        expect(sink.errorCount).toBe(2);
    });

    it('attaches the source unit name when a range is given', () => {
        const sink = new DiagnosticsSink('Token.sol');
        const located = sink.report('TypeError', 'bad', { start: 4, length: 2, sourceIndex: 0 });
        const unlocated = sink.report('TypeError', 'worse');

        expect(located.location).toEqual({ sourceUnitName: 'Token.sol', range: { start: 4, length: 2, sourceIndex: 0 } });
        expect(unlocated.location).toBeNull();
    });

    it('formats one line per diagnostic and null when empty', () => {
        const sink = new DiagnosticsSink('Test.sol');
        expect(sink.format()).toBeNull();

        sink.warning('Unreachable code.');
        sink.report('TypeError', 'Type bool is not implicitly convertible to expected type uint256.');
        expect(sink.format()).toBe(
            'Warning: Unreachable code.\nTypeError: Type bool is not implicitly convertible to expected type uint256.\n'
        );
    });

    it('records the diagnostic before handing out a fatal error', () => {
        const sink = new DiagnosticsSink('Test.sol');
        const error = sink.fatal('TypeError', 'Contract expected.');

        expect(error).toBeInstanceOf(FatalError);
        expect(error.message).toBe('TypeError: Contract expected.');
        expect(sink.diagnostics).toEqual([error.diagnostic]);
        expect(sink.errorCount).toBe(1);
    });

    it('starts over after clear', () => {
        const sink = new DiagnosticsSink('Test.sol');
        sink.report('SyntaxError', 'x');
        sink.clear();

        expect(sink.diagnostics).toEqual([]);
        expect(sink.errorCount).toBe(0);
    });
});
