import { z } from 'zod';
import { DEFAULT_SOURCE_UNIT_NAME, Logger, SILENT_LOGGER } from '../config';
import { AnalysisContextError } from '../context';

/**
 * Component that merges the members of a contract fragment into a target
 * contract and analyses the result. Both calls return the merged
 * `AnalysisSuccessful` document, or null when merging or analysis failed.
 *
 * When `contractName` is null the last contract of the target is used.
 */
export interface StitchBackend {
    stitchIntoSource(fragment: string, targetSource: string, sourceUnitName: string, contractName: string | null): string | null;
    stitchIntoAst(fragment: string, targetAst: string, contractName: string | null): string | null;
}

const DOCUMENT = z.object({ nodeType: z.literal('SourceUnit') }).passthrough();

/**
 * Binds one fragment to a backend for any number of stitch requests
 */
export class StitchSession {
    private destroyed = false;

    constructor(
        private readonly backend: StitchBackend,
        private readonly fragment: string,
        private readonly logger: Logger = SILENT_LOGGER
    ) {}

    stitchIntoSource(
        targetSource: string,
        sourceUnitName: string = DEFAULT_SOURCE_UNIT_NAME,
        contractName: string | null = null
    ): string | null {
        this.assertAlive();
        return this.forward(() => this.backend.stitchIntoSource(this.fragment, targetSource, sourceUnitName, contractName));
    }

    stitchIntoAst(targetAst: string, contractName: string | null = null): string | null {
        this.assertAlive();
        return this.forward(() => this.backend.stitchIntoAst(this.fragment, targetAst, contractName));
    }

    destroy(): void {
        this.assertAlive();
        this.destroyed = true;
    }

    private forward(request: () => string | null): string | null {
        let result: string | null;
        try {
            result = request();
        } catch (error) {
            this.logger.warn('Stitch request failed:', error);
            return null;
        }
        if (result === null) {
            return null;
        }
        if (!this.isSourceUnitDocument(result)) {
            this.logger.warn('Stitch backend returned a document that is not a source unit');
            return null;
        }
        return result;
    }

    private isSourceUnitDocument(text: string): boolean {
        try {
            return DOCUMENT.safeParse(JSON.parse(text)).success;
        } catch (error) {
            this.logger.warn('Stitch backend returned malformed JSON:', error);
            return false;
        }
    }

    private assertAlive(): void {
        if (this.destroyed) {
            throw new AnalysisContextError('Stitch session has been destroyed.');
        }
    }
}
