import { describe, expect, it } from 'vitest';
import { CallGraph, CallGraphNode } from '../annotations';
import { PipelineState } from '../pipeline';
import { analyzeSource, findNode } from './helpers';

function targets(graph: CallGraph | undefined, from: CallGraphNode): CallGraphNode[] {
    return [...(graph?.edges.get(from) ?? [])];
}

describe('CallGraphBuilder', () => {
    it('follows internal calls from the external entry points', () => {
        const { sourceUnit, result } = analyzeSource(`contract D {
    function g() internal pure returns (uint256) { return 1; }
    function h() public pure returns (uint256) { return g(); }
}`);
        const contract = findNode(sourceUnit, 'ContractDefinition');
        const g = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'g');
        const h = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'h');
        const deployed = result.unit?.annotations.deployedCallGraph.get(contract.id);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(deployed?.kind).toBe('deployed');
        expect(targets(deployed, 'Entry')).toEqual([h.id]);
        expect(targets(deployed, h.id)).toEqual([g.id]);
        expect(targets(deployed, g.id)).toEqual([]);
    });

    it('starts the creation graph at the constructor', () => {
        const { sourceUnit, result } = analyzeSource(`contract D {
    uint256 value;
    constructor() { value = init(); }
    function init() internal pure returns (uint256) { return 7; }
}`);
        const contract = findNode(sourceUnit, 'ContractDefinition');
        const constructor = findNode(sourceUnit, 'FunctionDefinition', node => node.kind === 'constructor');
        const init = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'init');
        const creation = result.unit?.annotations.creationCallGraph.get(contract.id);

        expect(targets(creation, 'Entry')).toEqual([constructor.id]);
        expect(targets(creation, constructor.id)).toEqual([init.id]);
        expect(result.unit?.annotations.deployedCallGraph.get(contract.id)?.edges.size).toBe(0);
    });

    it('resolves super calls along the linearisation', () => {
        const { sourceUnit, result } = analyzeSource(`
contract A { function f() public virtual returns (uint256) { return 1; } }
contract B is A { function f() public virtual override returns (uint256) { return 2; } }
contract C is A, B { function f() public override returns (uint256) { return super.f(); } }`);
        const contract = (name: string) => findNode(sourceUnit, 'ContractDefinition', node => node.name === name);
        const functionOf = (name: string) =>
            findNode(contract(name), 'FunctionDefinition');
        const deployed = result.unit?.annotations.deployedCallGraph.get(contract('C').id);

        expect(targets(deployed, 'Entry')).toEqual([functionOf('C').id]);
        expect(targets(deployed, functionOf('C').id)).toEqual([functionOf('B').id]);
    });

    it('records contracts created with new', () => {
        const { sourceUnit, result } = analyzeSource(`contract Child {}
contract Factory {
    Child public last;
    function make() public { last = new Child(); }
}`);
        const child = findNode(sourceUnit, 'ContractDefinition', node => node.name === 'Child');
        const factory = findNode(sourceUnit, 'ContractDefinition', node => node.name === 'Factory');
        const deployed = result.unit?.annotations.deployedCallGraph.get(factory.id);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect([...(deployed?.createdContracts ?? [])]).toEqual([child.id]);
    });
});
