import { AstNode, ExportStage, JsonObject, JsonValue, SourceUnit, formatSourceRange, isDeclaration } from '../types';
import { AnalysisUnit } from '../analyzer/analysisUnit';
import { CallGraph } from '../analyzer/annotations';
import { typeIdentifier, typeString } from '../analyzer/typeSystem';

const EXPRESSION_TYPES: ReadonlySet<string> = new Set([
    'Identifier',
    'MemberAccess',
    'IndexAccess',
    'FunctionCall',
    'Assignment',
    'BinaryOperation',
    'UnaryOperation',
    'Conditional',
    'Literal',
    'TupleExpression',
    'ElementaryTypeNameExpression',
    'NewExpression'
]);

const TYPE_NAME_TYPES: ReadonlySet<string> = new Set(['ElementaryTypeName', 'UserDefinedTypeName', 'ArrayTypeName', 'Mapping']);

/**
 * Writes a source unit as a compiler-style JSON document. Keys are sorted, so
 * two exports of equal trees are equal strings.
 */
export class AstExporter {
    constructor(
        private readonly stage: ExportStage,
        private readonly unit: AnalysisUnit | null = null
    ) {}

    export(sourceUnit: SourceUnit): JsonObject {
        return this.exportNode(sourceUnit);
    }

    /**
     * Pretty-printed document
     */
    stringify(sourceUnit: SourceUnit): string {
        return JSON.stringify(this.export(sourceUnit), null, 2);
    }

    private exportNode(node: AstNode): JsonObject {
        const record: JsonObject = {};
        for (const [key, value] of Object.entries(node)) {
            const field: unknown = value;
            record[key] = key === 'src' ? formatSourceRange(node.src) : this.exportValue(field);
        }
        if (this.stage === 'AnalysisSuccessful' && this.unit) {
            Object.assign(record, this.annotationsOf(node, this.unit));
        }
        return sortKeys(record);
    }

    private exportValue(value: unknown): JsonValue {
        if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
            return value;
        }
        if (Array.isArray(value)) {
            return value.map(item => this.exportValue(item));
        }
        if (isAstNode(value)) {
            return this.exportNode(value);
        }
        if (typeof value === 'object') {
            const record: JsonObject = {};
            for (const [key, field] of Object.entries(value)) {
                const item: unknown = field;
                record[key] = this.exportValue(item);
            }
            return sortKeys(record);
        }
        return null;
    }

    // ============ Annotations ============

    private annotationsOf(node: AstNode, unit: AnalysisUnit): JsonObject {
        const { annotations } = unit;
        const result: JsonObject = {};

        if (isDeclaration(node)) {
            const scope = annotations.scope.get(node.id);
            if (scope !== undefined) {
                result.scope = scope;
            }
        }

        if (isDeclaration(node) || EXPRESSION_TYPES.has(node.nodeType) || TYPE_NAME_TYPES.has(node.nodeType)) {
            const type = annotations.typeOf(node.id);
            result.typeDescriptions = type
                ? { typeIdentifier: typeIdentifier(type), typeString: typeString(type) }
                : {};
        }

        if (EXPRESSION_TYPES.has(node.nodeType)) {
            result.isLValue = annotations.isLValue.has(node.id);
            result.isPure = annotations.isPure.has(node.id);
            result.lValueRequested = annotations.lValueRequested.has(node.id);
        }

        switch (node.nodeType) {
            case 'Identifier':
                result.overloadedDeclarations = annotations.overloadedDeclarations.get(node.id) ?? [];
                result.referencedDeclaration = annotations.referencedDeclaration.get(node.id) ?? null;
                break;
            case 'IdentifierPath':
            case 'MemberAccess': {
                const referenced = annotations.referencedDeclaration.get(node.id);
                if (referenced !== undefined) {
                    result.referencedDeclaration = referenced;
                }
                break;
            }
            case 'FunctionCall':
                result.kind = annotations.functionCallKind.get(node.id) ?? 'functionCall';
                break;
            case 'FunctionDefinition':
                result.baseFunctions = annotations.baseFunctions.get(node.id) ?? [];
                break;
            case 'ModifierDefinition':
                result.baseModifiers = annotations.baseFunctions.get(node.id) ?? [];
                break;
            case 'VariableDeclaration':
                if (node.stateVariable && node.visibility === 'public') {
                    result.baseFunctions = annotations.baseFunctions.get(node.id) ?? [];
                }
                break;
            case 'ContractDefinition': {
                result.linearizedBaseContracts = annotations.linearizedBaseContracts.get(node.id) ?? [node.id];
                result.fullyImplemented = annotations.fullyImplemented.get(node.id) ?? false;
                result.usedErrors = annotations.usedErrors.get(node.id) ?? [];
                result.usedEvents = annotations.usedEvents.get(node.id) ?? [];
                const creation = annotations.creationCallGraph.get(node.id);
                const deployed = annotations.deployedCallGraph.get(node.id);
                if (creation) {
                    result.creationCallGraph = exportCallGraph(creation);
                }
                if (deployed) {
                    result.deployedCallGraph = exportCallGraph(deployed);
                }
                break;
            }
            case 'SourceUnit': {
                const symbols: JsonObject = {};
                for (const [name, ids] of annotations.exportedSymbols) {
                    symbols[name] = [...ids];
                }
                result.exportedSymbols = sortKeys(symbols);
                break;
            }
        }
        return result;
    }
}

function exportCallGraph(graph: CallGraph): JsonObject {
    const edges: JsonObject = {};
    for (const [from, targets] of graph.edges) {
        edges[String(from)] = [...targets].map(target => (typeof target === 'number' ? target : String(target)));
    }
    const ascending = (ids: Set<number>) => [...ids].sort((a, b) => a - b);
    return sortKeys({
        createdContracts: ascending(graph.createdContracts),
        edges: sortKeys(edges),
        emittedEvents: ascending(graph.emittedEvents),
        errors: ascending(graph.errors)
    });
}

function isAstNode(value: unknown): value is AstNode {
    return typeof value === 'object' && value !== null && 'nodeType' in value && 'id' in value;
}

function sortKeys(record: JsonObject): JsonObject {
    const sorted: JsonObject = {};
    for (const key of Object.keys(record).sort()) {
        sorted[key] = record[key];
    }
    return sorted;
}
