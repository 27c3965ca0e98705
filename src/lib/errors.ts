export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphError';
    }
}

/**
 * Thrown synchronously while a graph is being built: duplicate or reserved
 * node names, edges that reference unknown nodes, a second edge for the same
 * source, invalid options.
 */
export class GraphConstructionError extends GraphError {
    nodeName?: string;

    constructor(message: string, nodeName?: string) {
        super(message);
        this.name = 'GraphConstructionError';
        this.nodeName = nodeName;
    }
}

export class GraphNotConfiguredError extends GraphError {
    constructor(message = 'Entry point not set. Call setEntryPoint() first.') {
        super(message);
        this.name = 'GraphNotConfiguredError';
    }
}

export class MaxIterationsExceededError extends GraphError {
    maxIterations: number;

    constructor(maxIterations: number) {
        super(`Graph exceeded maximum iterations (${maxIterations}). Possible infinite loop.`);
        this.name = 'MaxIterationsExceededError';
        this.maxIterations = maxIterations;
    }
}

/**
 * A router resolved to a name that is neither a registered node nor END.
 */
export class InvalidRouteError extends GraphError {
    constructor(
        public readonly from: string,
        public readonly target: string,
    ) {
        super(`Router on "${from}" returned unknown node "${target}"`);
        this.name = 'InvalidRouteError';
    }
}

/** Validation error details */
export interface ValidationErrorItem {
    path: (string | number)[];
    message: string;
}

/**
 * Error thrown when a serialized checkpoint does not match the expected shape.
 */
export class CheckpointFormatError extends GraphError {
    /** Validation errors */
    issues: ValidationErrorItem[];

    constructor(message: string, issues: ValidationErrorItem[] = []) {
        super(message);
        this.name = 'CheckpointFormatError';
        this.issues = issues;
    }
}
