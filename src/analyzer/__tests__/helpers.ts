import { ASTTraverser } from '../../parser/astTraverser';
import { SolidityParser } from '../../parser/solidityParser';
import { AstNode, NodeType, SourceUnit, isNodeType } from '../../types/ast';
import { NodeOfType } from '../analysisUnit';
import { DiagnosticsSink } from '../diagnostics';
import { AnalysisPipeline, PipelineResult } from '../pipeline';

export const SOURCE_UNIT_NAME = 'Test.sol';

export const HEADER = '// SPDX-License-Identifier: MIT\npragma solidity ^0.8.20;\n';

export function parseSource(body: string, sink = new DiagnosticsSink(SOURCE_UNIT_NAME)): SourceUnit {
    const unit = new SolidityParser().parse(HEADER + body, SOURCE_UNIT_NAME, sink);
    if (!unit) {
        throw new Error(`Test source does not parse:\n${sink.format() ?? ''}`);
    }
    return unit;
}

export interface Analysis {
    sourceUnit: SourceUnit;
    result: PipelineResult;
    sink: DiagnosticsSink;
}

export function analyzeSource(body: string): Analysis {
    const sink = new DiagnosticsSink(SOURCE_UNIT_NAME);
    const sourceUnit = parseSource(body, sink);
    const result = new AnalysisPipeline().run(sourceUnit, sink);
    return { sourceUnit, result, sink };
}

/**
 * `<kind>: <message>` for every error-severity diagnostic
 */
export function errors(sink: DiagnosticsSink): string[] {
    return sink.diagnostics
        .filter(diagnostic => diagnostic.severity === 'error')
        .map(diagnostic => `${diagnostic.kind}: ${diagnostic.message}`);
}

export function warnings(sink: DiagnosticsSink): string[] {
    return sink.diagnostics
        .filter(diagnostic => diagnostic.severity === 'warning')
        .map(diagnostic => diagnostic.message);
}

/**
 * Every node of the given kind below `root`, in pre-order
 */
export function findAll<K extends NodeType>(
    root: AstNode,
    type: K,
    predicate: (node: NodeOfType<K>) => boolean = () => true
): NodeOfType<K>[] {
    const found: NodeOfType<K>[] = [];
    new ASTTraverser().traverse(root, {
        enter: node => {
            if (isNodeType(node, type) && predicate(node)) {
                found.push(node);
            }
        }
    });
    return found;
}

export function findNode<K extends NodeType>(
    root: AstNode,
    type: K,
    predicate: (node: NodeOfType<K>) => boolean = () => true
): NodeOfType<K> {
    const [node] = findAll(root, type, predicate);
    if (!node) {
        throw new Error(`No ${type} found.`);
    }
    return node;
}
