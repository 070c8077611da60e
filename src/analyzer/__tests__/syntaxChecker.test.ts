import { describe, expect, it } from 'vitest';
import { SolidityParser } from '../../parser/solidityParser';
import { DiagnosticsSink } from '../diagnostics';
import { AnalysisPipeline, PipelineState } from '../pipeline';
import { SOURCE_UNIT_NAME, analyzeSource, errors, warnings } from './helpers';

describe('SyntaxChecker', () => {
    it('warns about a missing license and version pragma', () => {
        const sink = new DiagnosticsSink(SOURCE_UNIT_NAME);
        const sourceUnit = new SolidityParser().parse('contract C {}', SOURCE_UNIT_NAME, sink);
        if (!sourceUnit) {
            throw new Error('Source does not parse.');
        }
        const result = new AnalysisPipeline().run(sourceUnit, sink);

        expect(result.state).toBe(PipelineState.Succeeded);
        const [license, pragma] = warnings(sink);
        expect(license.startsWith('SPDX license identifier not provided in source file.')).toBe(true);
        expect(pragma).toBe('Source file does not specify required compiler version!');
    });

    it('rejects break and continue outside loops', () => {
        const { sink } = analyzeSource('contract C { function f() public { break; } }');
        expect(errors(sink)).toEqual(['SyntaxError: "break" has to be in a "for" or "while" loop.']);
    });

    it('accepts break inside a loop', () => {
        const { result } = analyzeSource('contract C { function f() public { while (true) { break; } } }');
        expect(result.state).toBe(PipelineState.Succeeded);
    });

    it('requires a placeholder in every modifier body', () => {
        const { sink } = analyzeSource('contract C { modifier m() { } }');
        expect(errors(sink)).toEqual(["SyntaxError: Modifier body does not contain '_'."]);
    });

    it('asks for a visibility on contract functions', () => {
        const { sink } = analyzeSource('contract C { receive() payable {} }');
        expect(errors(sink)).toEqual(['SyntaxError: No visibility specified. Did you intend to add "external"?']);
    });

    it('allows one constructor per contract', () => {
        const { sink } = analyzeSource('contract C { constructor() {} constructor() {} }');
        expect(errors(sink)).toContain('DeclarationError: More than one constructor defined.');
    });
});
