import { DataHash, DataValue, LookupResult, NOT_FOUND, found } from './domain';
import { CyclicLookupError } from './errors';
import { Explainer, ExplainKind } from './explainer';
import type { LookupKey } from './lookup-key';
import type { MergeSpec } from './merge-strategy';
import { Scope } from './scope';

/**
 * What nested lookups (from `%{lookup('key')}` interpolation) call back into.
 */
export interface KeyLookupService {
    lookup(key: string, invocation: Invocation, merge?: MergeSpec): LookupResult;
}

export interface InvocationOptions {
    overrideValues?: DataHash;
    defaultValues?: DataHash;
    explainer?: Explainer;
}

interface InProgressEntry {
    key: string;
    moduleName: string | undefined;
}

/**
 * State of one top-level lookup: scope, the keys currently being looked up,
 * override and default values, and an optional explainer.
 */
export class Invocation {
    readonly overrideValues: DataHash;
    readonly defaultValues: DataHash;
    readonly explainer?: Explainer;
    lookupAdapter?: KeyLookupService;

    private readonly inProgress: InProgressEntry[] = [];
    private currentKey?: LookupKey;
    private currentModule?: string;

    constructor(readonly scope: Scope, options: InvocationOptions = {}) {
        this.overrideValues = options.overrideValues ?? {};
        this.defaultValues = options.defaultValues ?? {};
        this.explainer = options.explainer;
    }

    get topKey(): string {
        return this.currentKey ? this.currentKey.toString() : '';
    }

    get moduleName(): string | undefined {
        return this.currentModule;
    }

    get onlyExplainOptions(): boolean {
        return this.explainer?.onlyOptions ?? false;
    }

    /**
     * Runs `fn` with (key, moduleName) marked as in progress. Entering a pair that
     * is already in progress is a cycle.
     */
    lookup<T>(key: LookupKey, moduleName: string | undefined, fn: () => T): T {
        const name = key.toString();
        if (this.inProgress.some(entry => entry.key === name && entry.moduleName === moduleName)) {
            throw new CyclicLookupError([...this.inProgress.map(entry => entry.key), name]);
        }

        const savedKey = this.currentKey;
        const savedModule = this.currentModule;
        this.inProgress.push({ key: name, moduleName });
        this.currentKey = key;
        this.currentModule = moduleName;
        try {
            return fn();
        } finally {
            this.inProgress.pop();
            this.currentKey = savedKey;
            this.currentModule = savedModule;
        }
    }

    lookupScopeVariable(name: string): DataValue | undefined {
        return this.scope.lookupVariable(name);
    }

    with<T>(kind: ExplainKind, label: string, fn: () => T): T {
        if (!this.explainer) {
            return fn();
        }
        this.explainer.push(kind, label);
        try {
            return fn();
        } finally {
            this.explainer.pop();
        }
    }

    reportFound<T>(key: string, value: T): LookupResult<T> {
        this.explainer?.addEvent(`Found key: "${key}" value: ${JSON.stringify(value)}`);
        return found(value);
    }

    reportNotFound(key: string): { readonly found: false } {
        this.explainer?.addEvent(`No such key: "${key}"`);
        return NOT_FOUND;
    }

    reportMerged<T>(value: T): T {
        this.explainer?.addEvent(`Merged result: ${JSON.stringify(value)}`);
        return value;
    }

    reportMergeSource(source: string): void {
        this.explainer?.addEvent(`Using merge options from "${source}" hash`);
    }

    reportLocationNotFound(): { readonly found: false } {
        this.explainer?.addEvent('Path not found');
        return NOT_FOUND;
    }

    reportModuleNotFound(moduleName: string): void {
        this.explainer?.addEvent(`Module "${moduleName}" not found`);
    }

    reportModuleProviderNotFound(moduleName: string): void {
        this.explainer?.addEvent(`Module data provider for module "${moduleName}" not found`);
    }

    reportText(text: string | (() => string)): void {
        this.explainer?.addEvent(typeof text === 'string' ? text : text());
    }
}

/**
 * Records each scope variable read so a hierarchy built with it can tell when
 * the scope has drifted.
 */
export class ScopeLookupCollectingInvocation extends Invocation {
    readonly scopeInterpolations = new Map<string, DataValue | undefined>();

    constructor(source: Invocation) {
        super(source.scope, {
            overrideValues: source.overrideValues,
            defaultValues: source.defaultValues,
            explainer: source.explainer
        });
    }

    lookupScopeVariable(name: string): DataValue | undefined {
        const value = super.lookupScopeVariable(name);
        this.scopeInterpolations.set(name.startsWith('::') ? name.slice(2) : name, value);
        return value;
    }
}
