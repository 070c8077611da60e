import { describe, expect, it } from 'vitest';
import { PipelineState } from '../pipeline';
import { analyzeSource, errors, findNode, warnings } from './helpers';

describe('NameAndTypeResolver', () => {
    it('links identifiers to their declarations', () => {
        const { sourceUnit, result } = analyzeSource(
            'contract C { uint256 total; function f(uint256 a) public { total = a; } }'
        );
        const total = findNode(sourceUnit, 'VariableDeclaration', node => node.name === 'total');
        const parameter = findNode(sourceUnit, 'VariableDeclaration', node => node.name === 'a');
        const assignment = findNode(sourceUnit, 'Assignment');
        const references = result.unit?.annotations.referencedDeclaration;

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(references?.get(assignment.leftHandSide.id)).toBe(total.id);
        expect(references?.get(assignment.rightHandSide.id)).toBe(parameter.id);
    });

    it('aborts on an undeclared identifier', () => {
        const { result, sink } = analyzeSource('contract C { function f() public { x = 1; } }');

        expect(result.state).toBe(PipelineState.Aborted);
        expect(errors(sink)).toEqual(['DeclarationError: Undeclared identifier.']);
    });

    it('explains when a local is used before its declaration', () => {
        const { sink } = analyzeSource('contract C { function f() public { x = 1; uint256 x; } }');
        expect(errors(sink)).toEqual([
            'DeclarationError: Undeclared identifier. "x" is not (or not yet) visible at this point.'
        ]);
    });

    it('rejects two declarations of one name in a scope', () => {
        const { result, sink } = analyzeSource('contract C { uint256 x; uint256 x; }');

        expect(errors(sink)).toEqual(['DeclarationError: Identifier already declared.']);
        expect(result.executedStages[result.executedStages.length - 1]).toBe('registration');
    });

    it('warns when a local shadows a state variable', () => {
        const { result, sink } = analyzeSource('contract C { uint256 x; function f() public { uint256 x; } }');

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(warnings(sink)).toEqual(['This declaration shadows an existing declaration.']);
    });

    it('warns when a parameter shadows a builtin', () => {
        const { sink } = analyzeSource('contract C { function f(uint256 msg) public {} }');
        expect(warnings(sink)).toEqual(['This declaration shadows a builtin symbol.']);
    });

    it('reports imports of sources it was not given', () => {
        const { result, sink } = analyzeSource('import "./Other.sol";\ncontract C {}');

        expect(errors(sink)).toEqual(['DeclarationError: Source "./Other.sol" not found: File not supplied initially.']);
        expect(result.executedStages[result.executedStages.length - 1]).toBe('imports');
    });

    it('treats an import of its own name as a no-op', () => {
        const { result, sink } = analyzeSource('import "./Test.sol";\ncontract C {}');

        expect(errors(sink)).toEqual([]);
        expect(result.state).toBe(PipelineState.Succeeded);
    });

    it('linearises bases most derived first', () => {
        const { sourceUnit, result } = analyzeSource(`
contract A { function f() public virtual returns (uint256) { return 1; } }
contract B is A { function f() public virtual override returns (uint256) { return 2; } }
contract C is A, B { function f() public override returns (uint256) { return super.f(); } }`);
        const contract = (name: string) => findNode(sourceUnit, 'ContractDefinition', node => node.name === name);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.unit?.annotations.linearizedBaseContracts.get(contract('C').id)).toEqual([
            contract('C').id,
            contract('B').id,
            contract('A').id
        ]);
    });

    it('refuses a base listed before its own base', () => {
        const { sink } = analyzeSource('contract A {} contract B is A {} contract C is B, A {}');
        expect(errors(sink)).toEqual(['TypeError: Linearization of inheritance graph impossible']);
    });

    it('refuses a base that is not a contract', () => {
        const { sink } = analyzeSource('struct S { uint256 a; } contract C is S {}');
        expect(errors(sink)).toEqual(['TypeError: Contract expected.']);
    });
});
