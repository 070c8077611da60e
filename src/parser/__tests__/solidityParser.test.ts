import { describe, expect, it } from 'vitest';
import { DiagnosticsSink } from '../../analyzer/diagnostics';
import { HEADER, findNode, parseSource } from '../../analyzer/__tests__/helpers';
import { SolidityParser } from '../solidityParser';

describe('SolidityParser', () => {
    it('hands out ids in pre-order starting at the source unit', () => {
        const unit = parseSource('contract C { uint256 x; function f(uint256 a) public {} }');
        const contract = findNode(unit, 'ContractDefinition');
        const variable = findNode(unit, 'VariableDeclaration', node => node.name === 'x');
        const func = findNode(unit, 'FunctionDefinition');
        const parameter = findNode(unit, 'VariableDeclaration', node => node.name === 'a');

        expect(unit.id).toBe(0);
        expect(unit.nodes.map(node => node.id)).toEqual([1, 2]);
        expect(contract.id).toBe(2);
        expect(variable.id).toBe(3);
        expect(variable.typeName.id).toBe(4);
        expect(func.id).toBe(5);
        expect(func.parameters.id).toBe(6);
        expect(parameter.id).toBe(7);
        expect(func.returnParameters.id).toBe(9);
        expect(func.body?.id).toBe(10);
    });

    it('records the license and pragma of the unit', () => {
        const unit = parseSource('contract C {}');
        const pragma = findNode(unit, 'PragmaDirective');

        expect(unit.license).toBe('MIT');
        expect(unit.absolutePath).toBe('Test.sol');
        expect(pragma.literals[0]).toBe('solidity');
    });

    it('fills in default visibilities', () => {
        const unit = parseSource('contract C { uint256 x; constructor() {} }\nfunction helper() pure {}');
        const variable = findNode(unit, 'VariableDeclaration', node => node.name === 'x');
        const constructor = findNode(unit, 'FunctionDefinition', node => node.kind === 'constructor');
        const free = findNode(unit, 'FunctionDefinition', node => node.kind === 'freeFunction');

        expect(variable.visibility).toBe('internal');
        expect(constructor.visibility).toBe('public');
        expect(free.visibility).toBe('internal');
        expect(free.name).toBe('helper');
    });

    it('attaches NatSpec comments as documentation nodes', () => {
        const unit = parseSource('/// @title Counter\n/// @notice Counts\ncontract C {}');
        const contract = findNode(unit, 'ContractDefinition');

        expect(contract.documentation?.text).toBe('@title Counter\n@notice Counts');
        expect(contract.documentation?.id).toBe(3);
    });

    it('turns "_" inside a modifier into a placeholder', () => {
        const unit = parseSource('contract C { modifier m() { _; } }');
        const modifier = findNode(unit, 'ModifierDefinition');

        expect(modifier.body?.statements.map(statement => statement.nodeType)).toEqual(['PlaceholderStatement']);
    });

    it('parses payable(x) as an address conversion', () => {
        const unit = parseSource('contract C { function f(address a) public { payable(a); } }');
        const call = findNode(unit, 'FunctionCall');

        expect(call.expression.nodeType).toBe('ElementaryTypeNameExpression');
        if (call.expression.nodeType === 'ElementaryTypeNameExpression') {
            expect(call.expression.typeName.name).toBe('address');
            expect(call.expression.typeName.stateMutability).toBe('payable');
        }
    });

    it('reports constructs it does not model', () => {
        const sink = new DiagnosticsSink('Test.sol');
        const unit = new SolidityParser().parse(
            `${HEADER}contract C { function f() public { assembly {} } }`,
            'Test.sol',
            sink
        );

        expect(unit).toBeNull();
        expect(sink.diagnostics.map(d => `${d.kind}: ${d.message}`)).toEqual([
            'UnimplementedFeatureError: Inline assembly is not supported.'
        ]);
    });

    it('reports only the first grammar error', () => {
        const sink = new DiagnosticsSink('Test.sol');
        const unit = new SolidityParser().parse(`${HEADER}contract C { uint256 x uint256 y }`, 'Test.sol', sink);

        expect(unit).toBeNull();
        expect(sink.diagnostics).toHaveLength(1);
        expect(sink.diagnostics[0].kind).toBe('ParserError');
        expect(sink.diagnostics[0].message).toMatch(/\(\d+:\d+\)$/);
    });

    it('builds a fresh tree on every call', () => {
        const parser = new SolidityParser();
        const sink = new DiagnosticsSink('Test.sol');
        const source = `${HEADER}contract C {}`;

        const first = parser.parse(source, 'Test.sol', sink);
        const second = parser.parse(source, 'Test.sol', sink);
        expect(second).not.toBe(first);
        expect(second).toEqual(first);
    });

    it('parses address(x) as a non-payable address conversion', () => {
        const unit = parseSource('contract C { function f() public view returns (address) { return address(this); } }');
        const call = findNode(unit, 'FunctionCall');

        expect(call.expression.nodeType).toBe('ElementaryTypeNameExpression');
        if (call.expression.nodeType === 'ElementaryTypeNameExpression') {
            expect(call.expression.typeName.name).toBe('address');
            expect(call.expression.typeName.stateMutability).toBe('nonpayable');
        }
        expect(call.arguments.map(arg => arg.nodeType)).toEqual(['Identifier']);
    });

    it('reports type(...) expressions as unsupported', () => {
        const sink = new DiagnosticsSink('Test.sol');
        const unit = new SolidityParser().parse(
            `${HEADER}contract C { function f() public pure returns (uint256) { return type(uint256).max; } }`,
            'Test.sol',
            sink
        );

        expect(unit).toBeNull();
        expect(sink.diagnostics.map(d => `${d.kind}: ${d.message}`)).toEqual([
            'UnimplementedFeatureError: The "type(...)" expression is not supported.'
        ]);
    });
});
