export { AnalysisContext, AnalysisContextError } from './context';
export { DEFAULT_SOURCE_UNIT_NAME, resolveOptions } from './config';
export type { AnalysisOptions, Logger } from './config';
export { AnalysisPipeline, PipelineState, STAGES } from './analyzer/pipeline';
export type { PipelineResult, Stage, StageTier } from './analyzer/pipeline';
export { DiagnosticsSink, FatalError } from './analyzer/diagnostics';
export type { Diagnostic, DiagnosticKind, DiagnosticSeverity } from './analyzer/diagnostics';
export { SolidityParser } from './parser/solidityParser';
export { AstExporter } from './interchange/astExporter';
export { AstImporter, InterchangeError } from './interchange/astImporter';
export { StitchSession } from './stitching/stitcher';
export type { StitchBackend } from './stitching/stitcher';
export * from './types';
