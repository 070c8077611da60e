import * as parser from '@solidity-parser/parser';
import type { SourceUnit as RawSourceUnit } from '@solidity-parser/parser/dist/src/ast-types';
import { SourceUnit } from '../types/ast';
import { DiagnosticsSink } from '../analyzer/diagnostics';
import { AstBuilder, UnsupportedConstructError } from './astBuilder';

export class SolidityParser {
    /**
     * Parse a Solidity source file into the compiler-shaped syntax tree.
     * Returns null after reporting to the sink when the text is not valid
     * or uses a construct the analysis does not model.
     */
    parse(sourceCode: string, sourceUnitName: string, sink: DiagnosticsSink): SourceUnit | null {
        const raw = this.parseRaw(sourceCode, sink);
        if (!raw) {
            return null;
        }

        try {
            return new AstBuilder(sourceCode, sourceUnitName).build(raw);
        } catch (error) {
            if (error instanceof UnsupportedConstructError) {
                sink.report('UnimplementedFeatureError', error.message, error.range);
                return null;
            }
            throw error;
        }
    }

    /**
     * Get the library's own tree, reporting the first grammar error
     */
    parseRaw(sourceCode: string, sink: DiagnosticsSink): RawSourceUnit | null {
        try {
            return parser.parse(sourceCode, {
                loc: true,
                range: true,
                tolerant: false
            });
        } catch (error) {
            if (error instanceof parser.ParserError) {
                const [first] = error.errors;
                if (first) {
                    sink.report('ParserError', `${first.message} (${first.line}:${first.column})`);
                } else {
                    sink.report('ParserError', error.message);
                }
                return null;
            }
            throw error;
        }
    }
}
