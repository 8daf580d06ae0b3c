/**
 * Records what a lookup did so it can be explained afterwards.
 */

export type ExplainKind =
    | 'data'
    | 'meta'
    | 'global'
    | 'environment'
    | 'module'
    | 'data_provider'
    | 'location'
    | 'sub_lookup'
    | 'scope'
    | 'invalid_key';

const KIND_LABELS: Record<ExplainKind, string> = {
    data: 'Searching for',
    meta: 'Searching for',
    global: 'Global Data Provider',
    environment: 'Environment Data Provider',
    module: 'Module Data Provider',
    data_provider: 'Data Provider',
    location: 'Location',
    sub_lookup: 'Sub key',
    scope: 'Merge source',
    invalid_key: 'Invalid key',
};

interface ExplainNode {
    kind: ExplainKind | 'root';
    label: string;
    events: string[];
    children: ExplainNode[];
}

export interface ExplainerOptions {
    /** Only explain how lookup options are resolved; produce no data. */
    onlyOptions?: boolean;
}

export class Explainer {
    readonly onlyOptions: boolean;
    private readonly root: ExplainNode = { kind: 'root', label: '', events: [], children: [] };
    private readonly stack: ExplainNode[] = [this.root];

    constructor(options: ExplainerOptions = {}) {
        this.onlyOptions = options.onlyOptions ?? false;
    }

    push(kind: ExplainKind, label: string): void {
        const node: ExplainNode = { kind, label, events: [], children: [] };
        this.current().children.push(node);
        this.stack.push(node);
    }

    pop(): void {
        if (this.stack.length > 1) {
            this.stack.pop();
        }
    }

    addEvent(text: string): void {
        this.current().events.push(text);
    }

    /** Every recorded event in the order it happened, depth first. */
    events(): string[] {
        const result: string[] = [];
        const walk = (node: ExplainNode): void => {
            result.push(...node.events);
            node.children.forEach(walk);
        };
        walk(this.root);
        return result;
    }

    explain(): string {
        const lines: string[] = [];
        const walk = (node: ExplainNode, depth: number): void => {
            const indent = '  '.repeat(depth);
            if (node.kind !== 'root') {
                lines.push(`${indent}${KIND_LABELS[node.kind]} ${node.label}`);
            }
            const inner = node.kind === 'root' ? depth : depth + 1;
            for (const event of node.events) {
                lines.push(`${'  '.repeat(inner)}${event}`);
            }
            node.children.forEach(child => walk(child, inner));
        };
        walk(this.root, 0);
        return lines.join('\n');
    }

    private current(): ExplainNode {
        return this.stack[this.stack.length - 1];
    }
}
