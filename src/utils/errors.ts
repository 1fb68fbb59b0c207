// Errors raised by the analysis core. Each carries a message meant to be
// shown to the user as-is.
export class AnalysisError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Malformed, empty or disallowed formula. */
export class ExpressionError extends AnalysisError {}

/** Nothing left to analyze, or too few points for the request. */
export class EmptyDataError extends AnalysisError {}

/** Invalid x-range or point count. */
export class DomainError extends AnalysisError {}

/** A vector whose length does not match the domain it belongs to. */
export class ShapeMismatchError extends AnalysisError {}

/** A point row that is half filled or not numeric. */
export class InputError extends AnalysisError {}

export const getErrorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};
