import { SourceUnit } from '../types/ast';
import { Logger, SILENT_LOGGER } from '../config';
import { AnalysisUnit } from './analysisUnit';
import { CallGraphBuilder } from './callGraphBuilder';
import { ContractLevelChecker } from './contractLevelChecker';
import { DeclarationTypeChecker } from './declarationTypeChecker';
import { DiagnosticsSink, FatalError } from './diagnostics';
import { DocStringAnalyser } from './docStringAnalyser';
import { DocStringTagParser } from './docStringTagParser';
import { NameAndTypeResolver } from './nameAndTypeResolver';
import { PostTypeChecker } from './postTypeChecker';
import { PostTypeContractLevelChecker } from './postTypeContractLevelChecker';
import { Scoper } from './scoper';
import { SyntaxChecker } from './syntaxChecker';
import { TypeChecker } from './typeChecker';

export enum PipelineState {
    Running = 'Running',
    Degraded = 'Degraded',
    Aborted = 'Aborted',
    Succeeded = 'Succeeded'
}

/**
 * How a stage's failure affects the run:
 * - unconditional: always runs and never fails
 * - abort: a failure ends the run
 * - accumulate: a failure degrades the run, later stages still run
 * - gated: runs only while nothing has failed
 */
export type StageTier = 'unconditional' | 'abort' | 'accumulate' | 'gated';

/**
 * State shared by the stages of one run. The resolver is shared because
 * registration, import resolution and name resolution work on the same
 * scopes.
 */
export interface StageContext {
    unit: AnalysisUnit;
    resolver: NameAndTypeResolver;
    docStrings: DocStringTagParser;
}

export interface Stage {
    name: string;
    tier: StageTier;
    run(context: StageContext): void;
}

export const STAGES: readonly Stage[] = [
    { name: 'scopes', tier: 'unconditional', run: ({ unit }) => new Scoper(unit).assignScopes() },
    { name: 'syntax', tier: 'accumulate', run: ({ unit }) => new SyntaxChecker(unit).check() },
    { name: 'registration', tier: 'abort', run: ({ resolver }) => resolver.registerDeclarations() },
    { name: 'imports', tier: 'abort', run: ({ resolver }) => resolver.resolveImports() },
    { name: 'homonyms', tier: 'unconditional', run: ({ resolver }) => resolver.warnHomonymDeclarations() },
    { name: 'docstringTags', tier: 'accumulate', run: ({ docStrings }) => docStrings.parseDocStrings() },
    { name: 'nameResolution', tier: 'abort', run: ({ resolver }) => resolver.resolveNamesAndTypes() },
    { name: 'declarationTypes', tier: 'abort', run: ({ unit }) => new DeclarationTypeChecker(unit).check() },
    { name: 'docstringTypes', tier: 'accumulate', run: ({ docStrings }) => docStrings.validateDocStringsUsingTypes() },
    { name: 'contractLevel', tier: 'accumulate', run: ({ unit }) => new ContractLevelChecker(unit).check() },
    { name: 'typeCheck', tier: 'accumulate', run: ({ unit }) => new TypeChecker(unit).check() },
    { name: 'docstringAnalysis', tier: 'gated', run: ({ unit }) => new DocStringAnalyser(unit).analyseDocStrings() },
    { name: 'postTypeCheck', tier: 'gated', run: ({ unit }) => new PostTypeChecker(unit).check() },
    { name: 'callGraphs', tier: 'gated', run: ({ unit }) => new CallGraphBuilder(unit).build() },
    { name: 'postTypeContractLevel', tier: 'gated', run: ({ unit }) => new PostTypeContractLevelChecker(unit).check() }
];

export interface PipelineResult {
    state: PipelineState.Degraded | PipelineState.Aborted | PipelineState.Succeeded;
    /** The analysed unit; null once the run aborted */
    unit: AnalysisUnit | null;
    /** Names of the stages that ran, in order */
    executedStages: string[];
}

/**
 * Runs the analysis stages over one source unit and decides the outcome
 * from the diagnostics each stage reports.
 */
export class AnalysisPipeline {
    constructor(
        private readonly logger: Logger = SILENT_LOGGER,
        private readonly stages: readonly Stage[] = STAGES
    ) {}

    run(sourceUnit: SourceUnit, sink: DiagnosticsSink): PipelineResult {
        const executedStages: string[] = [];
        let state = PipelineState.Running;

        const unit = new AnalysisUnit(sourceUnit, sink);
        const context: StageContext = {
            unit,
            resolver: new NameAndTypeResolver(unit),
            docStrings: new DocStringTagParser(unit)
        };

        for (const stage of this.stages) {
            if (stage.tier === 'gated' && state !== PipelineState.Running) {
                this.logger.debug(`Skipping stage ${stage.name}: analysis is ${state}`);
                continue;
            }

            const errorsBefore = sink.errorCount;
            executedStages.push(stage.name);
            try {
                stage.run(context);
            } catch (error) {
                if (!(error instanceof FatalError)) {
                    const message = error instanceof Error ? error.message : String(error);
                    this.logger.warn(`Stage ${stage.name} failed:`, error);
                    sink.report('InternalCompilerError', message);
                }
                return { state: PipelineState.Aborted, unit: null, executedStages };
            }

            if (sink.errorCount === errorsBefore) continue;
            if (stage.tier === 'abort') {
                this.logger.debug(`Aborting after stage ${stage.name}`);
                return { state: PipelineState.Aborted, unit: null, executedStages };
            }
            state = PipelineState.Degraded;
        }

        return {
            state: state === PipelineState.Running ? PipelineState.Succeeded : PipelineState.Degraded,
            unit,
            executedStages
        };
    }
}
