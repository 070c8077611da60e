import { EventDefinition, VariableDeclaration } from '../types/ast';
import { ASTTraverser } from '../parser/astTraverser';
import { AnalysisUnit } from './analysisUnit';

/**
 * Checks that need the types of every expression: constant initialisers
 * and indexed event parameters.
 */
export class PostTypeChecker {
    constructor(private readonly unit: AnalysisUnit) {}

    check(): void {
        const constants: VariableDeclaration[] = [];
        new ASTTraverser().traverse(this.unit.sourceUnit, {
            enter: node => {
                if (node.nodeType === 'VariableDeclaration' && node.constant) {
                    constants.push(node);
                } else if (node.nodeType === 'EventDefinition') {
                    this.checkIndexedParameters(node);
                }
            }
        });

        for (const constant of constants) {
            if (!constant.value) {
                this.unit.sink.report('TypeError', 'Uninitialized "constant" variable.', constant.src);
            } else if (!this.unit.annotations.isPure.has(constant.value.id)) {
                this.unit.sink.report(
                    'TypeError',
                    'Initial value for constant variable has to be compile-time constant.',
                    constant.value.src
                );
            }
        }
        this.checkCyclicConstants(constants);
    }

    private checkIndexedParameters(event: EventDefinition): void {
        const indexed = event.parameters.parameters.filter(param => param.indexed).length;
        if (event.anonymous && indexed > 4) {
            this.unit.sink.report('TypeError', 'More than 4 indexed arguments for anonymous event.', event.src);
        } else if (!event.anonymous && indexed > 3) {
            this.unit.sink.report('TypeError', 'More than 3 indexed arguments for event.', event.src);
        }
    }

    private checkCyclicConstants(constants: VariableDeclaration[]): void {
        // Map: constant id -> constants its initial value reads
        const dependencies = new Map<number, VariableDeclaration[]>();
        for (const constant of constants) {
            dependencies.set(constant.id, this.constantsReadBy(constant));
        }

        const finished = new Set<number>();
        const active = new Set<number>();
        const findCycle = (constant: VariableDeclaration): VariableDeclaration | null => {
            if (finished.has(constant.id)) {
                return null;
            }
            active.add(constant.id);
            for (const dependency of dependencies.get(constant.id) ?? []) {
                if (active.has(dependency.id)) {
                    return dependency;
                }
                const found = findCycle(dependency);
                if (found) {
                    return found;
                }
            }
            active.delete(constant.id);
            finished.add(constant.id);
            return null;
        };

        for (const constant of constants) {
            active.clear();
            const via = findCycle(constant);
            if (via) {
                this.unit.sink.report(
                    'TypeError',
                    `The value of the constant ${constant.name} has a cyclic dependency via ${via.name}.`,
                    constant.src
                );
                finished.add(constant.id);
            }
        }
    }

    private constantsReadBy(constant: VariableDeclaration): VariableDeclaration[] {
        const found: VariableDeclaration[] = [];
        if (!constant.value) {
            return found;
        }
        new ASTTraverser().traverse(constant.value, {
            enter: node => {
                if (node.nodeType !== 'Identifier' && node.nodeType !== 'MemberAccess') return;
                const id = this.unit.annotations.referencedDeclaration.get(node.id);
                const variable = id === undefined ? null : this.unit.find(id, 'VariableDeclaration');
                if (variable && variable.constant && !found.includes(variable)) {
                    found.push(variable);
                }
            }
        });
        return found;
    }
}
