import { ContractDefinition, FunctionDefinition } from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';

const LICENSE_WARNING =
    'SPDX license identifier not provided in source file. Before publishing, consider adding a comment ' +
    'containing "SPDX-License-Identifier: <SPDX-License>" to each source file. Use ' +
    '"SPDX-License-Identifier: UNLICENSED" for non-open-source code. Please see https://spdx.org for more information.';

/**
 * Structural checks that need no name or type information
 */
export class SyntaxChecker {
    constructor(private readonly unit: AnalysisUnit) {}

    check(): void {
        const { sourceUnit, sink } = this.unit;
        if (sourceUnit.license === null) {
            sink.warning(LICENSE_WARNING);
        }
        const hasVersionPragma = sourceUnit.nodes.some(
            node => node.nodeType === 'PragmaDirective' && node.literals[0] === 'solidity'
        );
        if (!hasVersionPragma) {
            sink.warning('Source file does not specify required compiler version!');
        }

        let loopDepth = 0;
        let modifierDepth = 0;
        let placeholderSeen = false;

        new ASTTraverser().traverse(sourceUnit, {
            enter: node => {
                switch (node.nodeType) {
                    case 'ForStatement':
                    case 'WhileStatement':
                    case 'DoWhileStatement':
                        loopDepth++;
                        break;
                    case 'Break':
                    case 'Continue':
                        if (loopDepth === 0) {
                            const keyword = node.nodeType === 'Break' ? 'break' : 'continue';
                            sink.report('SyntaxError', `"${keyword}" has to be in a "for" or "while" loop.`, node.src);
                        }
                        break;
                    case 'ModifierDefinition':
                        modifierDepth++;
                        placeholderSeen = false;
                        break;
                    case 'PlaceholderStatement':
                        if (modifierDepth === 0) {
                            sink.report('SyntaxError', '"_" is only valid inside a modifier.', node.src);
                        }
                        placeholderSeen = true;
                        break;
                    case 'StructDefinition':
                        if (node.members.length === 0) {
                            sink.report('SyntaxError', 'Defining empty structs is disallowed.', node.src);
                        }
                        break;
                    case 'FunctionDefinition':
                        this.checkVisibility(node);
                        break;
                    case 'ContractDefinition':
                        this.checkSpecialFunctions(node);
                        break;
                }
            },
            leave: node => {
                switch (node.nodeType) {
                    case 'ForStatement':
                    case 'WhileStatement':
                    case 'DoWhileStatement':
                        loopDepth--;
                        break;
                    case 'ModifierDefinition':
                        modifierDepth--;
                        if (node.body && !placeholderSeen) {
                            sink.report('SyntaxError', "Modifier body does not contain '_'.", node.src);
                        }
                        break;
                }
            }
        });
    }

    private checkVisibility(function_: FunctionDefinition): void {
        if (function_.kind === 'freeFunction') {
            if (function_.visibility !== 'internal') {
                this.unit.sink.report('SyntaxError', 'Free functions cannot have visibility.', function_.src);
            }
            return;
        }
        if (function_.visibility !== 'default') {
            return;
        }
        const suggestion = function_.kind === 'fallback' || function_.kind === 'receive' ? 'external' : 'public';
        this.unit.sink.report(
            'SyntaxError',
            `No visibility specified. Did you intend to add "${suggestion}"?`,
            function_.src
        );
    }

    private checkSpecialFunctions(contract: ContractDefinition): void {
        const messages: Record<string, string> = {
            constructor: 'More than one constructor defined.',
            fallback: 'Only one fallback function is allowed.',
            receive: 'Only one receive function is allowed.'
        };
        const seen = new Set<string>();
        for (const member of contract.nodes) {
            if (member.nodeType !== 'FunctionDefinition' || !(member.kind in messages)) continue;
            if (seen.has(member.kind)) {
                this.unit.sink.report('DeclarationError', messages[member.kind], member.src);
            }
            seen.add(member.kind);
        }
    }
}
