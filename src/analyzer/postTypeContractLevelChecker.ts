import { ContractDefinition, ErrorDefinition } from '../types/ast';
import { AnalysisUnit } from './analysisUnit';
import { typeString } from './typeSystem';

/**
 * Derives the errors and events a contract can raise from its call
 * graphs and rejects errors whose signatures clash.
 */
export class PostTypeContractLevelChecker {
    constructor(private readonly unit: AnalysisUnit) {}

    check(): void {
        for (const contract of this.unit.contracts()) {
            this.checkContract(contract);
        }
    }

    private checkContract(contract: ContractDefinition): void {
        const graphs = [
            this.unit.annotations.creationCallGraph.get(contract.id),
            this.unit.annotations.deployedCallGraph.get(contract.id)
        ];
        const errors = new Set<number>();
        const events = new Set<number>();
        for (const graph of graphs) {
            if (!graph) continue;
            graph.errors.forEach(id => errors.add(id));
            graph.emittedEvents.forEach(id => events.add(id));
        }
        const usedErrors = [...errors].sort((a, b) => a - b);
        this.unit.annotations.usedErrors.set(contract.id, usedErrors);
        this.unit.annotations.usedEvents.set(contract.id, [...events].sort((a, b) => a - b));

        // Map: signature -> first used error with it
        const signatures = new Map<string, ErrorDefinition>();
        for (const id of usedErrors) {
            const error = this.unit.find(id, 'ErrorDefinition');
            if (!error) continue;
            const signature = `${error.name}(${this.parameterTypes(error)})`;
            const previous = signatures.get(signature);
            if (previous && previous.id !== error.id) {
                this.unit.sink.report(
                    'TypeError',
                    `Error signature clash: "${signature}" is declared more than once among the errors used by "${contract.name}".`,
                    error.src
                );
                continue;
            }
            signatures.set(signature, error);
        }
    }

    private parameterTypes(error: ErrorDefinition): string {
        return error.parameters.parameters
            .map(param => {
                const type = this.unit.annotations.typeOf(param.id);
                return type ? typeString(type, true) : '?';
            })
            .join(',');
    }
}
