import { AnalysisOptions, ResolvedOptions, resolveOptions } from './config';
import { Diagnostic, DiagnosticsSink } from './analyzer/diagnostics';
import { AnalysisPipeline, PipelineResult, PipelineState } from './analyzer/pipeline';
import { SolidityParser } from './parser/solidityParser';
import { AstExporter } from './interchange/astExporter';
import { AstImporter, InterchangeError } from './interchange/astImporter';
import { SourceUnit } from './types/ast';

/**
 * Thrown when a context is used after destroy() or re-entered while a call
 * is still running
 */
export class AnalysisContextError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AnalysisContextError';
    }
}

/**
 * Entry point for callers. A context parses source text into a `Parsed`
 * document and analyses such documents into `AnalysisSuccessful` ones,
 * keeping the diagnostics of its last call.
 *
 * Usage:
 *   const context = AnalysisContext.create();
 *   const parsed = context.parse(source, 'Token.sol');
 *   const analysed = parsed && context.analyze(parsed, 'Token.sol');
 *   if (!analysed) console.warn(context.getErrors());
 *   context.destroy();
 */
export class AnalysisContext {
    private readonly options: ResolvedOptions;
    private readonly parser = new SolidityParser();
    private readonly pipeline: AnalysisPipeline;
    private sink: DiagnosticsSink;
    private lastResult: PipelineResult | null = null;
    private destroyed = false;
    private busy = false;

    private constructor(options: AnalysisOptions) {
        this.options = resolveOptions(options);
        this.pipeline = new AnalysisPipeline(this.options.logger);
        this.sink = new DiagnosticsSink(this.options.sourceUnitName);
    }

    static create(options: AnalysisOptions = {}): AnalysisContext {
        return new AnalysisContext(options);
    }

    /**
     * Parse source text. Returns the pretty-printed `Parsed` document, or
     * null when the text has syntax errors.
     */
    parse(source: string, sourceUnitName: string = this.options.sourceUnitName): string | null {
        return this.guarded(sourceUnitName, sink => {
            const unit = this.parser.parse(source, sourceUnitName, sink);
            return unit ? new AstExporter('Parsed').stringify(unit) : null;
        });
    }

    /**
     * Analyse a `Parsed` document. Returns the pretty-printed
     * `AnalysisSuccessful` document, or null unless every stage passed.
     * A document that is not a well-formed tree yields null and no
     * diagnostics.
     */
    analyze(parsedAstJson: string, sourceUnitName: string = this.options.sourceUnitName): string | null {
        return this.guarded(sourceUnitName, sink => {
            let sourceUnit: SourceUnit;
            try {
                sourceUnit = new AstImporter().import(parsedAstJson, sourceUnitName);
            } catch (error) {
                if (error instanceof InterchangeError) {
                    this.options.logger.warn(`Failed to import ${sourceUnitName}:`, error.message);
                    return null;
                }
                throw error;
            }

            const result = this.pipeline.run(sourceUnit, sink);
            this.lastResult = result;
            if (result.state !== PipelineState.Succeeded || !result.unit) {
                return null;
            }
            return new AstExporter('AnalysisSuccessful', result.unit).stringify(sourceUnit);
        });
    }

    /**
     * Diagnostics of the last call as `<kind>: <message>` lines, or null
     * when there were none
     */
    getErrors(): string | null {
        this.assertAlive();
        return this.sink.format();
    }

    get diagnostics(): readonly Diagnostic[] {
        this.assertAlive();
        return this.sink.diagnostics;
    }

    /**
     * Outcome of the last analyze() call, for instrumentation
     */
    get lastAnalysis(): PipelineResult | null {
        this.assertAlive();
        return this.lastResult;
    }

    destroy(): void {
        this.assertAlive();
        this.destroyed = true;
        this.sink.clear();
        this.lastResult = null;
    }

    private guarded(sourceUnitName: string, body: (sink: DiagnosticsSink) => string | null): string | null {
        this.assertAlive();
        if (this.busy) {
            throw new AnalysisContextError('Analysis context is already in use.');
        }
        this.busy = true;
        this.sink = new DiagnosticsSink(sourceUnitName);
        this.lastResult = null;
        try {
            return body(this.sink);
        } catch (error) {
            this.options.logger.warn(`Unexpected failure for ${sourceUnitName}:`, error);
            this.sink.report('InternalCompilerError', error instanceof Error ? error.message : String(error));
            return null;
        } finally {
            this.busy = false;
        }
    }

    private assertAlive(): void {
        if (this.destroyed) {
            throw new AnalysisContextError('Analysis context has been destroyed.');
        }
    }
}
