/**
 * Thrown when one or more output effects of an operation failed. The
 * individual failures are kept so callers can log each of them.
 */
export class EffectsError extends Error {
    readonly causes: Error[];

    constructor(causes: Error[]) {
        super(causes.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.causes = causes;
    }
}
