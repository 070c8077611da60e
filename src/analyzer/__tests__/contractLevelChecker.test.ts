import { describe, expect, it } from 'vitest';
import { PipelineState } from '../pipeline';
import { analyzeSource, errors, findNode } from './helpers';

describe('ContractLevelChecker', () => {
    it('records the base functions an override replaces', () => {
        const { sourceUnit, result } = analyzeSource(`
contract A { function f() public virtual returns (uint256) { return 1; } }
contract B is A { function f() public virtual override returns (uint256) { return 2; } }
contract C is A, B { function f() public override returns (uint256) { return super.f(); } }`);
        const inContract = (name: string) =>
            findNode(sourceUnit, 'FunctionDefinition', node => {
                const owner = result.unit?.enclosing(node, 'ContractDefinition');
                return owner?.name === name;
            });

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.unit?.annotations.baseFunctions.get(inContract('B').id)).toEqual([inContract('A').id]);
        expect(result.unit?.annotations.baseFunctions.get(inContract('C').id)).toEqual([inContract('B').id]);
    });

    it('requires the override specifier', () => {
        const { result, sink } = analyzeSource(
            'contract A { function f() public virtual {} } contract B is A { function f() public {} }'
        );

        expect(result.state).toBe(PipelineState.Degraded);
        expect(errors(sink)).toEqual(['TypeError: Overriding function is missing "override" specifier.']);
    });

    it('refuses to override a function that is not virtual', () => {
        const { sink } = analyzeSource(
            'contract A { function f() public {} } contract B is A { function f() public override {} }'
        );
        expect(errors(sink)).toEqual(['TypeError: Trying to override non-virtual function. Did you forget to add "virtual"?']);
    });

    it('rejects an override specifier with nothing to override', () => {
        const { sink } = analyzeSource('contract C { function f() public override {} }');
        expect(errors(sink)).toEqual(['TypeError: Function has override specified but does not override anything.']);
    });

    it('asks for abstract on a contract with unimplemented functions', () => {
        const { sourceUnit, result, sink } = analyzeSource('contract C { function f() public virtual; }');
        const contract = findNode(sourceUnit, 'ContractDefinition');

        expect(errors(sink)).toEqual(['TypeError: Contract "C" should be marked as abstract.']);
        expect(result.unit?.annotations.fullyImplemented.get(contract.id)).toBe(false);
    });

    it('requires unimplemented functions to be virtual', () => {
        const { sink } = analyzeSource('abstract contract C { function f() public; }');
        expect(errors(sink)).toEqual(['TypeError: Functions without implementation must be marked virtual.']);
    });

    it('rejects two functions with one signature', () => {
        const { sink } = analyzeSource('contract C { function f(uint256 a) public {} function f(uint256 b) public {} }');
        expect(errors(sink)).toContain('DeclarationError: Function with same name and parameter types defined twice.');
    });

    it('enforces interface rules', () => {
        const { sink } = analyzeSource('interface I { function f() public; }');
        expect(errors(sink)).toEqual(['TypeError: Functions in interfaces must be declared external.']);
    });

    it('enforces library rules', () => {
        const { sink } = analyzeSource('library L { uint256 x; }');
        expect(errors(sink)).toEqual(['TypeError: Library cannot have non-constant state variables']);
    });
});
