export type ErrorCode =
    | 'configuration'
    | 'not_configured'
    | 'dimension_mismatch'
    | 'tool_not_found'
    | 'tool_argument'
    | 'time_parse'

export class TesseraError extends Error {
    constructor(readonly code: ErrorCode, message: string) {
        super(message)
        this.name = new.target.name
    }
}

// No active model, missing API key, invalid settings
export class ConfigurationError extends TesseraError {
    constructor(message: string) {
        super('configuration', message)
    }
}

// An optional collaborator (embedder, store) was needed but never attached
export class NotConfiguredError extends TesseraError {
    constructor(message: string) {
        super('not_configured', message)
    }
}

export class DimensionMismatchError extends TesseraError {
    constructor(readonly expected: number, readonly actual: number) {
        super('dimension_mismatch', `Embedding dim ${actual} != expected ${expected}`)
    }
}

export class ToolNotFoundError extends TesseraError {
    constructor(readonly toolName: string) {
        super('tool_not_found', `Tool not found: ${toolName}`)
    }
}

/**
 * Raised by the registry's argument binder when the supplied args do not fit a
 * tool's input schema. Kept apart from runtime failures so callers can report
 * the two differently.
 */
export class ToolArgumentError extends TesseraError {
    constructor(readonly toolName: string, readonly details: string) {
        super('tool_argument', details)
    }
}

export class TimeParseError extends TesseraError {
    constructor(readonly input: string) {
        super('time_parse', `Could not parse time from: ${input}`)
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
