export class InterpolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InterpolationError';
    }
}

export class PathSyntaxError extends InterpolationError {
    constructor(public problem: string, public path: string) {
        super(`${problem} in '${path}'`);
        this.name = 'PathSyntaxError';
    }
}

export class SecurityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SecurityError';
    }
}
