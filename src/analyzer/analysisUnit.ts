import {
    AstNode,
    ContractDefinition,
    Declaration,
    NodeType,
    SourceUnit,
    isDeclaration,
    isNodeType
} from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { Annotations, InternalFault } from './annotations';
import { DiagnosticsSink } from './diagnostics';
import { GlobalContext, MagicVariableDeclaration } from './globalContext';
import { DeclarationContainer } from './declarationContainer';

export type NodeOfType<K extends NodeType> = Extract<AstNode, { nodeType: K }>;

/**
 * One source unit under analysis: the tree, its id index, the annotation
 * store every stage writes to and the sink every stage reports to.
 */
export class AnalysisUnit {
    readonly annotations = new Annotations();
    readonly globals = new GlobalContext();

    // Map: scope node id -> declarations registered in that scope
    readonly containers: Map<number, DeclarationContainer> = new Map();

    private readonly nodes: Map<number, AstNode>;
    private readonly parents: Map<number, AstNode>;

    constructor(readonly sourceUnit: SourceUnit, readonly sink: DiagnosticsSink) {
        const traverser = new ASTTraverser();
        this.nodes = traverser.buildIndex(sourceUnit);
        this.parents = traverser.buildParentMap(sourceUnit);
    }

    /**
     * Node with the given id; a dangling id is an internal fault
     */
    node(id: number): AstNode {
        const node = this.nodes.get(id);
        if (!node) {
            throw new InternalFault(`No node with id ${id}.`);
        }
        return node;
    }

    find<K extends NodeType>(id: number, type: K): NodeOfType<K> | null {
        const node = this.nodes.get(id);
        return node && isNodeType(node, type) ? node : null;
    }

    parentOf(node: AstNode): AstNode | null {
        return this.parents.get(node.id) ?? null;
    }

    /**
     * Closest ancestor of the given kind
     */
    enclosing<K extends NodeType>(node: AstNode, type: K): NodeOfType<K> | null {
        let current = this.parentOf(node);
        while (current) {
            if (isNodeType(current, type)) {
                return current;
            }
            current = this.parentOf(current);
        }
        return null;
    }

    contracts(): ContractDefinition[] {
        return this.sourceUnit.nodes.filter((node): node is ContractDefinition => node.nodeType === 'ContractDefinition');
    }

    contract(id: number): ContractDefinition {
        const contract = this.find(id, 'ContractDefinition');
        if (!contract) {
            throw new InternalFault(`Node ${id} is not a contract.`);
        }
        return contract;
    }

    /**
     * Declaration a reference resolved to, including builtins
     */
    declaration(id: number): Declaration | MagicVariableDeclaration | null {
        if (id < 0) {
            return this.globals.get(id) ?? null;
        }
        const node = this.nodes.get(id);
        return node && isDeclaration(node) ? node : null;
    }

    /**
     * Linearised bases of a contract, most derived first
     */
    linearization(contract: ContractDefinition): ContractDefinition[] {
        const ids = this.annotations.linearizedBaseContracts.get(contract.id) ?? [contract.id];
        return ids.map(id => this.contract(id));
    }

    /**
     * Whether `base` appears in the linearisation of `derived`
     */
    isBaseContract(derived: number, base: number): boolean {
        return (this.annotations.linearizedBaseContracts.get(derived) ?? [derived]).includes(base);
    }

    /**
     * Name qualified with the enclosing contract
     */
    canonicalName(declaration: Declaration): string {
        const contract = this.enclosing(declaration, 'ContractDefinition');
        return contract ? `${contract.name}.${declaration.name}` : declaration.name;
    }
}
