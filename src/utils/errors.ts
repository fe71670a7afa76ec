/**
 * 🚨 ERROR HANDLING
 * Typed errors for the harvesting run. Card-level failures are recovered
 * inside the harvester; only HarvestError subclasses end a search.
 */

export class LeadFinderError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/** Fatal to a single search call. The orchestrator reports it and returns no leads. */
export class HarvestError extends LeadFinderError {}

export class NavigationError extends HarvestError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NAVIGATION_ERROR', context);
    }
}

export class SessionError extends HarvestError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SESSION_ERROR', context);
    }
}

export class ExtractionError extends LeadFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'EXTRACTION_ERROR', context);
    }
}

export class ConfigurationError extends LeadFinderError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class ValidationError extends LeadFinderError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', { fatal: false });
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
