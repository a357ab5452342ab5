/**
 * Failure taxonomy for portal access. Callers switch on `code`; the handlers turn each code
 * into its own HTTP status.
 */

export type PortalErrorCode =
    | 'captcha_required'
    | 'timeout'
    | 'transport_failure'
    | 'not_found'
    | 'empty_listing'
    | 'parse_failure'
    | 'invalid_search';

export abstract class PortalError extends Error {
    abstract readonly code: PortalErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class CaptchaRequiredError extends PortalError {
    readonly code = 'captcha_required';

    constructor(readonly url: string) {
        super('Portal returned a captcha; request cannot be completed automatically.');
    }
}

export class PortalTimeoutError extends PortalError {
    readonly code = 'timeout';

    constructor(
        message: string,
        readonly attempts: number
    ) {
        super(message);
    }
}

export class TransportFailureError extends PortalError {
    readonly code = 'transport_failure';

    constructor(
        message: string,
        readonly attempts: number,
        readonly status?: number
    ) {
        super(message);
    }
}

export class NotFoundError extends PortalError {
    readonly code = 'not_found';

    constructor(
        readonly entity: 'state' | 'commission',
        readonly query: string,
        readonly suggestions: string[]
    ) {
        super(`Unknown ${entity} '${query}'`);
    }
}

/**
 * The portal answered with no states, or no commissions for a state. Usually a busy or
 * error page served with status 200, so the result is never cached.
 */
export class EmptyListingError extends PortalError {
    readonly code = 'empty_listing';

    constructor(
        readonly entity: 'states' | 'commissions',
        readonly stateId?: string
    ) {
        super(stateId ? `No ${entity} found for state ID: ${stateId}` : `No ${entity} found`);
    }
}

export class ParseFailureError extends PortalError {
    readonly code = 'parse_failure';

    constructor(
        message: string,
        readonly rowIndex: number
    ) {
        super(message);
    }
}

export class InvalidSearchError extends PortalError {
    readonly code = 'invalid_search';

    constructor(
        message: string,
        readonly field?: string
    ) {
        super(message);
    }
}
