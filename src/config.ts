/**
 * Logging sink used by the pipeline and the analysis context
 */
export type Logger = Pick<Console, 'debug' | 'warn'>;

export interface AnalysisOptions {
    /** Name used when a call does not give one */
    sourceUnitName?: string;
    logger?: Logger;
    /** Log to the console when no logger is given */
    verbose?: boolean;
}

export interface ResolvedOptions {
    sourceUnitName: string;
    logger: Logger;
}

export const DEFAULT_SOURCE_UNIT_NAME = 'Contract.sol';

export const SILENT_LOGGER: Logger = {
    debug: () => undefined,
    warn: () => undefined
};

export function resolveOptions(options: AnalysisOptions = {}): ResolvedOptions {
    return {
        sourceUnitName: options.sourceUnitName ?? DEFAULT_SOURCE_UNIT_NAME,
        logger: options.logger ?? (options.verbose ? console : SILENT_LOGGER)
    };
}
