import { describe, expect, it, vi } from 'vitest';
import { AstExporter } from '../../interchange/astExporter';
import { DiagnosticsSink } from '../diagnostics';
import { AnalysisPipeline, PipelineState, STAGES, Stage } from '../pipeline';
import { SOURCE_UNIT_NAME, analyzeSource, errors, findNode, parseSource, warnings } from './helpers';

const COUNTER = `contract Counter {
    uint256 public count;
    event Incremented(uint256 value);
    error TooLarge(uint256 value);

    function increment(uint256 by) public {
        if (count + by > 1000) revert TooLarge(count + by);
        count += by;
        emit Incremented(count);
    }

    function current() public view returns (uint256) {
        return count;
    }
}`;

function testLogger() {
    return { debug: vi.fn(), warn: vi.fn() };
}

function runStages(stages: Stage[]) {
    const sink = new DiagnosticsSink(SOURCE_UNIT_NAME);
    const logger = testLogger();
    const result = new AnalysisPipeline(logger, stages).run(parseSource('contract C {}'), sink);
    return { result, sink, logger };
}

describe('AnalysisPipeline stage tiers', () => {
    it('keeps going after an accumulating failure but skips gated stages', () => {
        const gated = vi.fn();
        const { result, logger } = runStages([
            { name: 'a', tier: 'accumulate', run: ({ unit }) => unit.sink.report('TypeError', 'x') },
            { name: 'b', tier: 'accumulate', run: () => undefined },
            { name: 'c', tier: 'gated', run: gated }
        ]);

        expect(result.state).toBe(PipelineState.Degraded);
        expect(result.executedStages).toEqual(['a', 'b']);
        expect(result.unit).not.toBeNull();
        expect(gated).not.toHaveBeenCalled();
        expect(logger.debug).toHaveBeenCalledWith('Skipping stage c: analysis is Degraded');
    });

    it('stops at a fatal error without reporting anything more', () => {
        const later = vi.fn();
        const { result, sink, logger } = runStages([
            {
                name: 'a',
                tier: 'accumulate',
                run: ({ unit }) => {
                    throw unit.sink.fatal('TypeError', 'Contract expected.');
                }
            },
            { name: 'b', tier: 'unconditional', run: later }
        ]);

        expect(result).toEqual({ state: PipelineState.Aborted, unit: null, executedStages: ['a'] });
        expect(errors(sink)).toEqual(['TypeError: Contract expected.']);
        expect(later).not.toHaveBeenCalled();
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('turns an unexpected exception into an internal compiler error', () => {
        const failure = new Error('boom');
        const { result, sink, logger } = runStages([
            {
                name: 'a',
                tier: 'unconditional',
                run: () => {
                    throw failure;
                }
            }
        ]);

        expect(result.state).toBe(PipelineState.Aborted);
        expect(errors(sink)).toEqual(['InternalCompilerError: boom']);
        expect(logger.warn).toHaveBeenCalledWith('Stage a failed:', failure);
    });

    it('aborts when an abort-tier stage reports an error', () => {
        const later = vi.fn();
        const { result, logger } = runStages([
            { name: 'a', tier: 'unconditional', run: () => undefined },
            { name: 'b', tier: 'abort', run: ({ unit }) => unit.sink.report('DeclarationError', 'Identifier already declared.') },
            { name: 'c', tier: 'accumulate', run: later }
        ]);

        expect(result).toEqual({ state: PipelineState.Aborted, unit: null, executedStages: ['a', 'b'] });
        expect(logger.debug).toHaveBeenCalledWith('Aborting after stage b');
        expect(later).not.toHaveBeenCalled();
    });

    it('does not count warnings as failures', () => {
        const { result, sink } = runStages([
            { name: 'a', tier: 'abort', run: ({ unit }) => unit.sink.warning('careful') },
            { name: 'b', tier: 'gated', run: () => undefined }
        ]);

        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.executedStages).toEqual(['a', 'b']);
        expect(warnings(sink)).toEqual(['careful']);
    });
});

describe('AnalysisPipeline over real sources', () => {
    it('annotates a contract that passes every stage', () => {
        const { sourceUnit, result, sink } = analyzeSource(COUNTER);
        const counter = findNode(sourceUnit, 'ContractDefinition');
        const count = findNode(sourceUnit, 'VariableDeclaration', node => node.name === 'count');
        const event = findNode(sourceUnit, 'EventDefinition');
        const error = findNode(sourceUnit, 'ErrorDefinition');
        const increment = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'increment');
        const current = findNode(sourceUnit, 'FunctionDefinition', node => node.name === 'current');

        expect(errors(sink)).toEqual([]);
        expect(result.state).toBe(PipelineState.Succeeded);
        expect(result.executedStages).toEqual(STAGES.map(stage => stage.name));

        const annotations = result.unit?.annotations;
        expect(annotations?.linearizedBaseContracts.get(counter.id)).toEqual([counter.id]);
        expect(annotations?.fullyImplemented.get(counter.id)).toBe(true);
        expect(annotations?.usedEvents.get(counter.id)).toEqual([event.id]);
        expect(annotations?.usedErrors.get(counter.id)).toEqual([error.id]);

        const deployed = annotations?.deployedCallGraph.get(counter.id);
        expect([...(deployed?.edges.get('Entry') ?? [])]).toEqual([increment.id, current.id]);
        expect([...(deployed?.emittedEvents ?? [])]).toEqual([event.id]);
        expect([...(deployed?.errors ?? [])]).toEqual([error.id]);
        expect(annotations?.creationCallGraph.get(counter.id)?.edges.size).toBe(0);
    });

    it('degrades on a syntax error and skips the gated stages', () => {
        const { result, sink } = analyzeSource('contract C { function f() {} }');

        expect(result.state).toBe(PipelineState.Degraded);
        expect(errors(sink)).toEqual(['SyntaxError: No visibility specified. Did you intend to add "public"?']);
        expect(result.executedStages).toEqual(STAGES.slice(0, 11).map(stage => stage.name));
    });

    it('reports every type error before degrading', () => {
        const { result, sink } = analyzeSource(`contract C {
    function f() public { uint256 x = true; }
    function g() public { bool y = 1; }
}`);

        expect(errors(sink)).toEqual([
            'TypeError: Type bool is not implicitly convertible to expected type uint256.',
            'TypeError: Type int_const 1 is not implicitly convertible to expected type bool.'
        ]);
        expect(result.state).toBe(PipelineState.Degraded);
        expect(result.executedStages).toEqual(STAGES.slice(0, 11).map(stage => stage.name));
    });

    it('builds no call graphs after a contract-level error', () => {
        const { sourceUnit, result, sink } = analyzeSource(
            'contract A { function f() public {} } contract B is A { function f() public override {} }'
        );
        const b = findNode(sourceUnit, 'ContractDefinition', node => node.name === 'B');

        expect(errors(sink)).toEqual(['TypeError: Trying to override non-virtual function. Did you forget to add "virtual"?']);
        expect(result.state).toBe(PipelineState.Degraded);
        expect(result.executedStages).not.toContain('callGraphs');
        expect(result.unit?.annotations.creationCallGraph.size).toBe(0);
        expect(result.unit?.annotations.deployedCallGraph.size).toBe(0);
        expect(result.unit?.annotations.usedEvents.has(b.id)).toBe(false);
    });

    it('aborts after name resolution fails', () => {
        const { result, sink } = analyzeSource('contract C { function f() public { x = 1; } }');

        expect(result.state).toBe(PipelineState.Aborted);
        expect(result.unit).toBeNull();
        expect(errors(sink)).toEqual(['DeclarationError: Undeclared identifier.']);
        expect(result.executedStages).toEqual([
            'scopes',
            'syntax',
            'registration',
            'imports',
            'homonyms',
            'docstringTags',
            'nameResolution'
        ]);
    });

    it('aborts on a fatal inheritance error', () => {
        const { result, sink } = analyzeSource('contract C is C {}');

        expect(result.state).toBe(PipelineState.Aborted);
        expect(errors(sink)).toEqual(['TypeError: Contract cannot inherit from itself.']);
        expect(result.executedStages[result.executedStages.length - 1]).toBe('nameResolution');
    });

    it('gives the same annotated document on every run over the same tree', () => {
        const sourceUnit = parseSource(COUNTER);
        const exportRun = () => {
            const result = new AnalysisPipeline().run(sourceUnit, new DiagnosticsSink(SOURCE_UNIT_NAME));
            if (!result.unit) {
                throw new Error('Analysis aborted.');
            }
            return new AstExporter('AnalysisSuccessful', result.unit).stringify(sourceUnit);
        };

        const first = exportRun();
        expect(first).toContain('"typeString": "uint256"');
        expect(exportRun()).toBe(first);
    });
});
