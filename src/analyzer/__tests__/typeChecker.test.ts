import { describe, expect, it } from 'vitest';
import { typeString } from '../typeSystem';
import { PipelineState } from '../pipeline';
import { analyzeSource, errors, findNode } from './helpers';

describe('TypeChecker', () => {
    it('folds constant arithmetic into a literal type', () => {
        const { sourceUnit, result } = analyzeSource(
            'contract C { function f() public pure returns (uint256) { return 2 + 3; } }'
        );
        const sum = findNode(sourceUnit, 'BinaryOperation');
        const type = result.unit?.annotations.typeOf(sum.id);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(type && typeString(type)).toBe('int_const 5');
        expect(result.unit?.annotations.isPure.has(sum.id)).toBe(true);
    });

    it('rejects an initial value of the wrong type', () => {
        const { result, sink } = analyzeSource('contract C { function f() public { uint256 x = true; } }');

        expect(result.state).toBe(PipelineState.Degraded);
        expect(errors(sink)).toEqual(['TypeError: Type bool is not implicitly convertible to expected type uint256.']);
    });

    it('checks returned values against the return parameters', () => {
        const { sink } = analyzeSource('contract C { function f() public pure returns (uint256) { return true; } }');
        expect(errors(sink)).toEqual([
            'TypeError: Return argument type bool is not implicitly convertible to expected type (type of first return variable) uint256.'
        ]);
    });

    it('requires emit for event invocations', () => {
        const { sink } = analyzeSource('contract C { event E(); function f() public { E(); } }');
        expect(errors(sink)).toEqual(['TypeError: Event invocations have to be prefixed by "emit".']);
    });

    it('refuses assignments to constants', () => {
        const { sink } = analyzeSource('contract C { uint256 constant X = 1; function f() public { X = 2; } }');
        expect(errors(sink)).toEqual(['TypeError: Cannot assign to a constant variable.']);
    });

    it('limits transfer to payable addresses', () => {
        const { sink } = analyzeSource('contract C { function f(address a) public { a.transfer(1); } }');
        expect(errors(sink)).toEqual([
            'TypeError: "send" and "transfer" are only available for objects of type "address payable", not "address".'
        ]);
    });

    it('accepts transfer after a payable conversion', () => {
        const { result } = analyzeSource('contract C { function f(address a) public { payable(a).transfer(1); } }');
        expect(result.state).toBe(PipelineState.Succeeded);
    });

    it('rejects explicit conversions between unrelated types', () => {
        const { sink } = analyzeSource('contract C { function f() public pure { bool b = bool(1); } }');
        expect(errors(sink)).toEqual(['TypeError: Explicit type conversion not allowed from "int_const 1" to "bool".']);
    });

    it('picks the overload of require that matches the arguments', () => {
        const { sourceUnit, result } = analyzeSource(
            'contract C { function f(uint256 a) public pure { require(a > 0, "positive"); } }'
        );
        const call = findNode(sourceUnit, 'FunctionCall');

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.unit?.annotations.referencedDeclaration.get(call.expression.id)).toBe(-19);
    });

    it('types msg.sender as an address', () => {
        const { sourceUnit, result } = analyzeSource(
            'contract C { address owner; constructor() { owner = msg.sender; } }'
        );
        const sender = findNode(sourceUnit, 'MemberAccess');
        const type = result.unit?.annotations.typeOf(sender.id);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(type && typeString(type)).toBe('address');
    });

    it('converts this, contracts and zero to address', () => {
        const { sourceUnit, result, sink } = analyzeSource(`contract D {}
contract C {
    address owner = address(0);
    function self() public view returns (address) { return address(this); }
    function other(D d) public pure returns (address) { return address(d); }
}`);
        const self = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'self');
        const call = findNode(self, 'FunctionCall');
        const type = result.unit?.annotations.typeOf(call.id);

        expect(errors(sink)).toEqual([]);
        expect(result.state).toBe(PipelineState.Succeeded);
        expect(type && typeString(type)).toBe('address');
        expect(result.unit?.annotations.functionCallKind.get(call.id)).toBe('typeConversion');
    });

    it('accepts hex literals that fill a fixed-size byte array exactly', () => {
        const { result, sink } = analyzeSource('contract C { bytes4 constant SELECTOR = 0x12345678; }');

        expect(errors(sink)).toEqual([]);
        expect(result.state).toBe(PipelineState.Succeeded);
    });

    it('rejects hex literals of the wrong width for a fixed-size byte array', () => {
        const { sink } = analyzeSource('contract C { function f() public pure { bytes4 x = 0x1234; } }');
        expect(errors(sink)).toEqual(['TypeError: Type int_const 4660 is not implicitly convertible to expected type bytes4.']);
    });

    it('rejects decimal literals for a fixed-size byte array', () => {
        const { sink } = analyzeSource('contract C { function f() public pure { bytes1 x = 1; } }');
        expect(errors(sink)).toEqual(['TypeError: Type int_const 1 is not implicitly convertible to expected type bytes1.']);
    });

    it('types string.concat and bytes.concat', () => {
        const { sourceUnit, result, sink } = analyzeSource(`contract C {
    function s(string memory a) public pure returns (string memory) { return string.concat(a, "b"); }
    function b(bytes memory a, bytes4 tag) public pure returns (bytes memory) { return bytes.concat(a, tag); }
}`);
        const joinStrings = findNode(findNode(sourceUnit, 'FunctionDefinition', node => node.name === 's'), 'FunctionCall');
        const type = result.unit?.annotations.typeOf(joinStrings.id);

        expect(errors(sink)).toEqual([]);
        expect(type && typeString(type)).toBe('string memory');
    });

    it('rejects concat arguments of the wrong type', () => {
        const { sink } = analyzeSource(
            'contract C { function f(string memory a) public pure returns (string memory) { return string.concat(a, 1); } }'
        );
        expect(errors(sink)).toEqual([
            'TypeError: Invalid type for argument in function call. Invalid implicit conversion from int_const 1 to string memory requested.'
        ]);
    });
});
