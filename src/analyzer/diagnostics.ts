import { SourceRange } from '../types/ast';

export type DiagnosticKind =
    | 'ParserError'
    | 'SyntaxError'
    | 'DeclarationError'
    | 'TypeError'
    | 'DocstringParsingError'
    | 'UnimplementedFeatureError'
    | 'InternalCompilerError'
    | 'Warning'
    | 'Info';

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface DiagnosticLocation {
    sourceUnitName: string;
    range: SourceRange;
}

export interface Diagnostic {
    readonly kind: DiagnosticKind;
    readonly severity: DiagnosticSeverity;
    readonly message: string;
    readonly location: DiagnosticLocation | null;
}

const SEVERITY_BY_KIND: Record<DiagnosticKind, DiagnosticSeverity> = {
    ParserError: 'error',
    SyntaxError: 'error',
    DeclarationError: 'error',
    TypeError: 'error',
    DocstringParsingError: 'error',
    UnimplementedFeatureError: 'error',
    InternalCompilerError: 'error',
    Warning: 'warning',
    Info: 'info'
};

/**
 * Thrown by a stage after it has reported a diagnostic that makes any
 * further analysis meaningless. The orchestrator maps it to an abort.
 */
export class FatalError extends Error {
    readonly diagnostic: Diagnostic;

    constructor(diagnostic: Diagnostic) {
        super(formatDiagnostic(diagnostic));
        this.name = 'FatalError';
        this.diagnostic = diagnostic;
    }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
    return `${diagnostic.kind}: ${diagnostic.message}`;
}

/**
 * Ordered, append-only collection of diagnostics for one parse or analyze
 * call. Reporting never throws.
 */
export class DiagnosticsSink {
    private records: Diagnostic[] = [];
    private errors = 0;

    constructor(private readonly sourceUnitName: string) {}

    report(kind: DiagnosticKind, message: string, range: SourceRange | null = null): Diagnostic {
        const diagnostic: Diagnostic = Object.freeze({
            kind,
            severity: SEVERITY_BY_KIND[kind],
            message,
            location: range ? { sourceUnitName: this.sourceUnitName, range } : null
        });
        this.records.push(diagnostic);
        if (diagnostic.severity === 'error') {
            this.errors++;
        }
        return diagnostic;
    }

    warning(message: string, range: SourceRange | null = null): Diagnostic {
        return this.report('Warning', message, range);
    }

    /**
     * Report a diagnostic and build the error that aborts the pipeline.
     * The caller throws it.
     */
    fatal(kind: DiagnosticKind, message: string, range: SourceRange | null = null): FatalError {
        return new FatalError(this.report(kind, message, range));
    }

    /**
     * Number of error-severity diagnostics reported so far. Stages compare
     * it before and after running to decide whether they failed.
     */
    get errorCount(): number {
        return this.errors;
    }

    get diagnostics(): readonly Diagnostic[] {
        return this.records;
    }

    clear(): void {
        this.records = [];
        this.errors = 0;
    }

    /**
     * One `<kind>: <message>` line per diagnostic, or null when empty
     */
    format(): string | null {
        if (this.records.length === 0) {
            return null;
        }
        return this.records.map(d => `${formatDiagnostic(d)}\n`).join('');
    }
}
