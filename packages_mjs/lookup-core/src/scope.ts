import { DataValue } from './domain';

/**
 * Read access to the variables interpolation expressions refer to.
 */
export interface Scope {
    lookupVariable(name: string): DataValue | undefined;
}

/**
 * Map backed scope. Names are stored without a leading `::`; unknown names fall
 * through to the parent scope.
 */
export class VariableScope implements Scope {
    private readonly variables = new Map<string, DataValue>();

    constructor(variables: Record<string, DataValue> = {}, private readonly parent?: Scope) {
        for (const [name, value] of Object.entries(variables)) {
            this.set(name, value);
        }
    }

    set(name: string, value: DataValue): this {
        this.variables.set(VariableScope.normalize(name), value);
        return this;
    }

    delete(name: string): boolean {
        return this.variables.delete(VariableScope.normalize(name));
    }

    lookupVariable(name: string): DataValue | undefined {
        const key = VariableScope.normalize(name);
        if (this.variables.has(key)) {
            return this.variables.get(key);
        }
        return this.parent?.lookupVariable(key);
    }

    /** Creates a nested scope whose own variables shadow this one. */
    child(variables: Record<string, DataValue> = {}): VariableScope {
        return new VariableScope(variables, this);
    }

    private static normalize(name: string): string {
        return name.startsWith('::') ? name.slice(2) : name;
    }
}
