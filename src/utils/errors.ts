export class RoleGraphError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'RoleGraphError';
    }
}

/**
 * An artifact an earlier stage should have produced is absent.
 * `path` is the expected file, or `<database>#<table>` for a stage table.
 */
export class MissingPrerequisiteError extends RoleGraphError {
    constructor(
        public readonly path: string,
        public readonly stage?: string
    ) {
        super(
            stage
                ? `Missing prerequisite for stage "${stage}": ${path}`
                : `Missing prerequisite: ${path}`,
            { path, stage }
        );
        this.name = 'MissingPrerequisiteError';
    }
}

/**
 * One input document could not be read as structured data.
 */
export class MalformedDocumentError extends RoleGraphError {
    constructor(message: string, public readonly source: string, details?: Record<string, unknown>) {
        super(message, { source, ...details });
        this.name = 'MalformedDocumentError';
    }
}

/**
 * The classification service answered with text that is not a classification.
 */
export class MalformedClassificationError extends RoleGraphError {
    constructor(public readonly content: string) {
        super(`Could not parse JSON from model: ${JSON.stringify(content)}`, { content });
        this.name = 'MalformedClassificationError';
    }
}
