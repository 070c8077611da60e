import { AstNode, ParameterList, StructuredDocumentation } from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';
import { DocTag } from './annotations';
import { documentationOf, resolveInheritdocTarget } from './docStringTagParser';

/**
 * Checks parameter tags against the documented signature and fills in
 * tags inherited from overridden base functions.
 */
export class DocStringAnalyser {
    constructor(private readonly unit: AnalysisUnit) {}

    analyseDocStrings(): void {
        new ASTTraverser().traverse(this.unit.sourceUnit, {
            enter: node => {
                switch (node.nodeType) {
                    case 'FunctionDefinition':
                        this.checkParameters(node, node.parameters, 'function');
                        this.handleInheritance(node);
                        break;
                    case 'ModifierDefinition':
                        this.checkParameters(node, node.parameters, 'modifier');
                        this.handleInheritance(node);
                        break;
                    case 'EventDefinition':
                        this.checkParameters(node, node.parameters, 'event');
                        break;
                    case 'ErrorDefinition':
                        this.checkParameters(node, node.parameters, 'error');
                        break;
                    case 'VariableDeclaration':
                        if (node.stateVariable && node.visibility === 'public') {
                            this.handleInheritance(node);
                        }
                        break;
                }
            }
        });
    }

    private checkParameters(node: AstNode, parameters: ParameterList, kind: string): void {
        const tags = this.unit.annotations.docTags.get(node.id);
        const documentation = documentationOf(node);
        if (!tags || !documentation) {
            return;
        }
        const names = new Set(parameters.parameters.map(param => param.name));
        for (const tag of tags) {
            if (tag.name !== 'param' || tag.paramName === null) continue;
            if (!names.has(tag.paramName)) {
                this.unit.sink.report(
                    'DocstringParsingError',
                    `Documented parameter "${tag.paramName}" not found in the parameter list of the ${kind}.`,
                    documentation.src
                );
            }
        }
    }

    /**
     * Resolve `@inheritdoc`, or copy the documentation of the single
     * overridden base when the node has none of its own
     */
    private handleInheritance(node: AstNode): void {
        const bases = this.unit.annotations.baseFunctions.get(node.id) ?? [];
        const tags = this.unit.annotations.docTags.get(node.id) ?? [];
        const inheritdoc = tags.find(tag => tag.name === 'inheritdoc');
        const documentation = documentationOf(node);

        if (!inheritdoc) {
            if (tags.length === 0 && bases.length === 1) {
                const inherited = this.unit.annotations.docTags.get(bases[0]);
                if (inherited) {
                    this.unit.annotations.docTags.set(node.id, inherited.map(tag => ({ ...tag })));
                }
            }
            return;
        }
        if (!documentation) {
            return;
        }

        const name = inheritdoc.content.trim();
        const target = resolveInheritdocTarget(this.unit, node, name);
        if (!target || target.nodeType !== 'ContractDefinition') {
            return;
        }
        const base = bases.find(id => {
            const baseNode = this.unit.node(id);
            return this.unit.enclosing(baseNode, 'ContractDefinition')?.id === target.id;
        });
        if (base === undefined) {
            this.reportMissingBase(name, documentation);
            return;
        }
        this.unit.annotations.docTags.set(node.id, mergeInherited(tags, this.unit.annotations.docTags.get(base) ?? []));
    }

    private reportMissingBase(name: string, documentation: StructuredDocumentation): void {
        this.unit.sink.report(
            'DocstringParsingError',
            `Documentation tag @inheritdoc references contract "${name}", but the contract does not contain a function that is overridden by this function.`,
            documentation.src
        );
    }
}

/**
 * Own tags win; inherited tags fill in the names the node does not document
 */
function mergeInherited(own: DocTag[], inherited: DocTag[]): DocTag[] {
    const merged = own.filter(tag => tag.name !== 'inheritdoc');
    const key = (tag: DocTag) => `${tag.name}:${tag.paramName ?? ''}`;
    const present = new Set(merged.map(key));
    for (const tag of inherited) {
        if (tag.name === 'inheritdoc' || present.has(key(tag))) continue;
        merged.push({ ...tag });
    }
    return merged;
}
