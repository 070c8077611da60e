import { SolType } from './typeSystem';

export type FunctionCallKind = 'functionCall' | 'typeConversion' | 'structConstructorCall';

export type CallGraphNode = number | 'Entry' | 'InternalDispatch';

export interface CallGraph {
    kind: 'creation' | 'deployed';
    contract: number;
    edges: Map<CallGraphNode, Set<CallGraphNode>>;
    emittedEvents: Set<number>;
    createdContracts: Set<number>;
    errors: Set<number>;
}

export interface DocTag {
    name: string;
    content: string;
    /** Parameter or return name the tag refers to, where it has one */
    paramName: string | null;
}

/**
 * Raised when a stage breaks an invariant of the analysis itself. The
 * orchestrator reports it as an internal compiler error.
 */
export class InternalFault extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InternalFault';
    }
}

/**
 * Everything the analysis derives about the tree, keyed by node id. Nodes
 * themselves stay purely syntactic, so a tree can be analysed again from
 * scratch by dropping the store.
 */
export class Annotations {
    readonly scope = new Map<number, number>();
    readonly referencedDeclaration = new Map<number, number>();
    readonly overloadedDeclarations = new Map<number, number[]>();
    readonly isLValue = new Set<number>();
    readonly isPure = new Set<number>();
    readonly lValueRequested = new Set<number>();
    readonly functionCallKind = new Map<number, FunctionCallKind>();
    readonly linearizedBaseContracts = new Map<number, number[]>();
    readonly baseFunctions = new Map<number, number[]>();
    readonly fullyImplemented = new Map<number, boolean>();
    readonly creationCallGraph = new Map<number, CallGraph>();
    readonly deployedCallGraph = new Map<number, CallGraph>();
    readonly usedErrors = new Map<number, number[]>();
    readonly usedEvents = new Map<number, number[]>();
    readonly exportedSymbols = new Map<string, number[]>();
    readonly docTags = new Map<number, DocTag[]>();

    private readonly types = new Map<number, SolType>();

    /**
     * Record the type of a node. Each node is typed exactly once per run.
     */
    setType(id: number, type: SolType): void {
        if (this.types.has(id)) {
            throw new InternalFault(`Type of node ${id} assigned twice.`);
        }
        this.types.set(id, type);
    }

    typeOf(id: number): SolType | undefined {
        return this.types.get(id);
    }

    hasType(id: number): boolean {
        return this.types.has(id);
    }

    /**
     * Type of a node that an earlier stage must have typed
     */
    requireType(id: number): SolType {
        const type = this.types.get(id);
        if (!type) {
            throw new InternalFault(`Node ${id} has no type.`);
        }
        return type;
    }
}
