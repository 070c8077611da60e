import { describe, expect, it } from 'vitest';
import { PipelineState } from '../pipeline';
import { analyzeSource, errors } from './helpers';

describe('PostTypeChecker', () => {
    it('requires constants to be initialised', () => {
        const { result, sink } = analyzeSource('contract C { uint256 constant X; }');

        expect(result.state).toBe(PipelineState.Degraded);
        expect(errors(sink)).toEqual(['TypeError: Uninitialized "constant" variable.']);
    });

    it('requires compile-time constant initial values', () => {
        const { sink } = analyzeSource('contract C { address constant OWNER = msg.sender; }');
        expect(errors(sink)).toEqual(['TypeError: Initial value for constant variable has to be compile-time constant.']);
    });

    it('limits the number of indexed event parameters', () => {
        const { sink } = analyzeSource(
            'contract C { event E(uint256 indexed a, uint256 indexed b, uint256 indexed c, uint256 indexed d); }'
        );
        expect(errors(sink)).toEqual(['TypeError: More than 3 indexed arguments for event.']);
    });

    it('allows four indexed parameters on anonymous events', () => {
        const { result } = analyzeSource(
            'contract C { event E(uint256 indexed a, uint256 indexed b, uint256 indexed c, uint256 indexed d) anonymous; }'
        );
        expect(result.state).toBe(PipelineState.Succeeded);
    });

    it('detects constants that depend on themselves', () => {
        const { sink } = analyzeSource('contract C { uint256 constant A = B; uint256 constant B = A; }');
        expect(errors(sink)).toEqual(['TypeError: The value of the constant A has a cyclic dependency via A.']);
    });
});
