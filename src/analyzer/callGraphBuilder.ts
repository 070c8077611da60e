import {
    AstNode,
    ContractDefinition,
    FunctionDefinition,
    Identifier,
    IdentifierPath,
    MemberAccess,
    ModifierDefinition
} from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';
import { CallGraph, CallGraphNode } from './annotations';
import { InheritanceResolver } from './inheritanceResolver';

/**
 * Builds, per contract, the graph of internal calls reachable at
 * construction time and the graph reachable once deployed.
 */
export class CallGraphBuilder {
    private readonly inheritance: InheritanceResolver;

    constructor(private readonly unit: AnalysisUnit) {
        this.inheritance = new InheritanceResolver(unit);
    }

    build(): void {
        for (const contract of this.unit.contracts()) {
            const creation = this.buildCreationGraph(contract);
            this.unit.annotations.creationCallGraph.set(contract.id, creation);
            this.unit.annotations.deployedCallGraph.set(contract.id, this.buildDeployedGraph(contract, creation));
        }
    }

    /**
     * Entry reaches state variable initialisers, base constructor arguments
     * and the constructors of the linearised bases, most base first
     */
    buildCreationGraph(contract: ContractDefinition): CallGraph {
        const walk = new GraphWalk(this.unit, this.inheritance, contract, 'creation');
        for (const base of [...this.unit.linearization(contract)].reverse()) {
            for (const member of base.nodes) {
                if (member.nodeType === 'VariableDeclaration' && member.value && !member.constant) {
                    walk.visit(member.value, 'Entry');
                }
            }
            for (const specifier of base.baseContracts) {
                for (const argument of specifier.arguments ?? []) {
                    walk.visit(argument, 'Entry');
                }
            }
            const constructor = base.nodes.find(
                (member): member is FunctionDefinition => member.nodeType === 'FunctionDefinition' && member.kind === 'constructor'
            );
            if (constructor) {
                walk.call('Entry', constructor);
            }
        }
        walk.processQueue();
        return walk.graph;
    }

    /**
     * Entry reaches every externally callable function; function pointers
     * created during construction stay reachable through InternalDispatch
     */
    buildDeployedGraph(contract: ContractDefinition, creation: CallGraph): CallGraph {
        const walk = new GraphWalk(this.unit, this.inheritance, contract, 'deployed');
        for (const function_ of this.externallyCallable(contract)) {
            walk.call('Entry', function_);
        }
        for (const target of creation.edges.get('InternalDispatch') ?? []) {
            if (typeof target !== 'number') continue;
            const function_ = this.unit.find(target, 'FunctionDefinition');
            if (function_) {
                walk.call('InternalDispatch', function_);
            }
        }
        walk.processQueue();
        return walk.graph;
    }

    private externallyCallable(contract: ContractDefinition): FunctionDefinition[] {
        const seen = new Set<string>();
        const result: FunctionDefinition[] = [];
        for (const base of this.unit.linearization(contract)) {
            for (const member of base.nodes) {
                if (member.nodeType !== 'FunctionDefinition') continue;
                let key: string;
                if (member.kind === 'fallback' || member.kind === 'receive') {
                    key = member.kind;
                } else if (member.kind === 'function' && (member.visibility === 'public' || member.visibility === 'external')) {
                    key = `${member.name}(${this.inheritance.signatureOf(member)})`;
                } else {
                    continue;
                }
                if (seen.has(key)) continue;
                seen.add(key);
                result.push(member);
            }
        }
        return result;
    }
}

/**
 * Worklist over the functions and modifiers reachable from one root set
 */
class GraphWalk {
    readonly graph: CallGraph;
    private readonly queue: (FunctionDefinition | ModifierDefinition)[] = [];
    private readonly enqueued = new Set<number>();

    constructor(
        private readonly unit: AnalysisUnit,
        private readonly inheritance: InheritanceResolver,
        private readonly contract: ContractDefinition,
        kind: CallGraph['kind']
    ) {
        this.graph = {
            kind,
            contract: contract.id,
            edges: new Map(),
            emittedEvents: new Set(),
            createdContracts: new Set(),
            errors: new Set()
        };
    }

    call(from: CallGraphNode, target: FunctionDefinition | ModifierDefinition): void {
        this.addEdge(from, target.id);
        if (!this.enqueued.has(target.id)) {
            this.enqueued.add(target.id);
            this.queue.push(target);
        }
    }

    processQueue(): void {
        for (let next = this.queue.shift(); next; next = this.queue.shift()) {
            this.visit(next, next.id);
        }
    }

    /**
     * Record the calls, emits, reverts and creations below `root` as made
     * by `from`
     */
    visit(root: AstNode, from: CallGraphNode): void {
        new ASTTraverser().traverse(root, {
            enter: node => {
                switch (node.nodeType) {
                    case 'Identifier':
                    case 'MemberAccess':
                        this.reference(node, from);
                        break;
                    case 'IdentifierPath':
                        this.modifierReference(node, from);
                        break;
                    case 'EmitStatement':
                    case 'RevertStatement': {
                        const call = node.nodeType === 'EmitStatement' ? node.eventCall : node.errorCall;
                        const id = this.unit.annotations.referencedDeclaration.get(call.expression.id);
                        if (id !== undefined) {
                            (node.nodeType === 'EmitStatement' ? this.graph.emittedEvents : this.graph.errors).add(id);
                        }
                        break;
                    }
                    case 'NewExpression': {
                        const created = this.unit.annotations.typeOf(node.typeName.id);
                        if (created && created.category === 'contract') {
                            this.graph.createdContracts.add(created.declaration);
                        }
                        break;
                    }
                }
            }
        });
    }

    private reference(node: Identifier | MemberAccess, from: CallGraphNode): void {
        const id = this.unit.annotations.referencedDeclaration.get(node.id);
        const function_ = id === undefined ? null : this.unit.find(id, 'FunctionDefinition');
        if (!function_) {
            return;
        }
        const type = this.unit.annotations.typeOf(node.id);
        if (!type || type.category !== 'function' || type.kind !== 'internal') {
            return;
        }

        let target: FunctionDefinition = function_;
        if (node.nodeType === 'Identifier') {
            target = this.inheritance.resolveVirtualFunction(function_, this.contract) ?? function_;
        } else {
            const base = this.unit.annotations.typeOf(node.expression.id);
            if (base && base.category === 'contract' && base.isSuper) {
                const caller = this.unit.enclosing(node, 'ContractDefinition');
                target = this.inheritance.resolveVirtualFunction(function_, this.contract, caller) ?? function_;
            }
        }

        const parent = this.unit.parentOf(node);
        const called = parent !== null && parent.nodeType === 'FunctionCall' && parent.expression.id === node.id;
        if (called) {
            this.call(from, target);
        } else {
            this.addEdge(from, 'InternalDispatch');
            this.call('InternalDispatch', target);
        }
    }

    private modifierReference(path: IdentifierPath, from: CallGraphNode): void {
        const parent = this.unit.parentOf(path);
        if (!parent || parent.nodeType !== 'ModifierInvocation') {
            return;
        }
        const id = this.unit.annotations.referencedDeclaration.get(path.id);
        const modifier = id === undefined ? null : this.unit.find(id, 'ModifierDefinition');
        if (!modifier) {
            return;
        }
        const target = path.name.includes('.') ? modifier : this.inheritance.resolveVirtualModifier(modifier, this.contract);
        this.call(from, target);
    }

    private addEdge(from: CallGraphNode, to: CallGraphNode): void {
        const targets = this.graph.edges.get(from) ?? new Set<CallGraphNode>();
        targets.add(to);
        this.graph.edges.set(from, targets);
    }
}
