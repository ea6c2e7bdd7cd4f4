export type TrackerErrorKind =
    | 'validation'
    | 'no_active_session'
    | 'no_profile'
    | 'lookup_unavailable'
    | 'invalid_amount';

/**
 * Base class for every recoverable failure raised by the tracker.
 *
 * Each failure is scoped to the operation that raised it: state is only written after all
 * validation and lookups have succeeded, so catching one of these never leaves a half-applied change.
 */
export abstract class TrackerError extends Error {
    abstract readonly kind: TrackerErrorKind;
    abstract readonly statusCode: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends TrackerError {
    readonly kind = 'validation';
    readonly statusCode = 400;

    /**
     * @param field - the input being collected when validation failed, when there is one
     */
    constructor(
        message: string,
        readonly field?: string
    ) {
        super(message);
    }
}

export class NoActiveSessionError extends TrackerError {
    readonly kind = 'no_active_session';
    readonly statusCode = 404;

    constructor() {
        super('No profile setup is in progress. Start one first.');
    }
}

export class NoProfileError extends TrackerError {
    readonly kind = 'no_profile';
    readonly statusCode = 404;

    constructor() {
        super('Set up your profile first.');
    }
}

export class LookupUnavailableError extends TrackerError {
    readonly kind = 'lookup_unavailable';
    readonly statusCode = 502;

    constructor(message = 'Could not find that food or its calorie content. Try a different query.') {
        super(message);
    }
}

export class InvalidAmountError extends TrackerError {
    readonly kind = 'invalid_amount';
    readonly statusCode = 400;
}

export const isTrackerError = (value: unknown): value is TrackerError => value instanceof TrackerError;
