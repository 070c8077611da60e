import { describe, expect, it } from 'vitest';
import { PipelineState } from '../pipeline';
import { analyzeSource, errors, findNode } from './helpers';

describe('DocStringTagParser', () => {
    it('rejects tags that are not valid for the documented node', () => {
        const { result, sink } = analyzeSource('/// @return x\ncontract C {}');

        expect(errors(sink)).toEqual(['DocstringParsingError: Documentation tag @return not valid for contracts.']);
        expect(result.state).toBe(PipelineState.Degraded);
    });

    it('rejects custom tags with uppercase letters', () => {
        const { sink } = analyzeSource('/// @custom:Note hi\ncontract C {}');
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Invalid character in custom tag @custom:Note. Only lowercase letters and "-" are permitted.'
        ]);
    });

    it('accepts lowercase custom tags', () => {
        const { sink } = analyzeSource('/// @custom:audit-note hi\ncontract C {}');
        expect(errors(sink)).toEqual([]);
    });

    it('rejects more return tags than return parameters', () => {
        const { sink } = analyzeSource(`contract C {
    /// @return first value
    /// @return second value
    function f() public pure returns (uint256) { return 1; }
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documentation tag "@return second value" exceeds the number of return parameters.'
        ]);
    });

    it('rejects an inheritdoc naming no known contract', () => {
        const { sink } = analyzeSource(`contract C {
    /// @inheritdoc Missing
    function f() public {}
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documentation tag @inheritdoc references inexistent contract "Missing".'
        ]);
    });
});

describe('DocStringAnalyser', () => {
    it('rejects a documented parameter the function does not have', () => {
        const { sink } = analyzeSource(`contract C {
    /// @param missing The value
    function f(uint256 amount) public {}
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documented parameter "missing" not found in the parameter list of the function.'
        ]);
    });

    it('rejects a documented parameter the event does not have', () => {
        const { sink } = analyzeSource(`contract C {
    /// @param who Sender
    event E(address from);
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documented parameter "who" not found in the parameter list of the event.'
        ]);
    });

    it('attaches a comment that follows code on its line to the next declaration', () => {
        const { sink } = analyzeSource(`contract C { /// @param missing Nothing
    function f() public {}
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documented parameter "missing" not found in the parameter list of the function.'
        ]);
    });

    it('rejects an inheritdoc whose contract holds no overridden function', () => {
        const { sink } = analyzeSource(`contract A { function g() public virtual {} }
contract B is A {
    /// @inheritdoc A
    function f() public {}
}`);
        expect(errors(sink)).toEqual([
            'DocstringParsingError: Documentation tag @inheritdoc references contract "A", but the contract does not contain a function that is overridden by this function.'
        ]);
    });

    it('copies the tags of the overridden function named by inheritdoc', () => {
        const { sourceUnit, result, sink } = analyzeSource(`contract A {
    /// @notice Does a thing
    function f() public virtual {}
}
contract B is A {
    /// @inheritdoc A
    function f() public override {}
}`);
        const b = findNode(sourceUnit, 'ContractDefinition', node => node.name === 'B');
        const f = findNode(b, 'FunctionDefinition');

        expect(errors(sink)).toEqual([]);
        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.unit?.annotations.docTags.get(f.id)).toEqual([
            { name: 'notice', content: 'Does a thing', paramName: null }
        ]);
    });
});
