import { APIGatewayProxyResult } from 'aws-lambda';
import {
    CaptchaRequiredError,
    EmptyListingError,
    InvalidSearchError,
    NotFoundError,
    PortalTimeoutError,
    TransportFailureError,
} from './PortalErrors';

/**
 * Creates a standardized API response with correct headers
 *
 * @param statusCode HTTP status code
 * @param body Response body (will be stringified)
 * @param additionalHeaders Optional additional headers to include
 * @returns API Gateway proxy response object
 */
export function createResponse<T>(
    statusCode: number,
    body: T,
    additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
    return {
        statusCode,
        headers: {
            'Content-Type': 'application/json',
            ...additionalHeaders,
        },
        body: JSON.stringify(body),
    };
}

/**
 * Creates a successful response (2xx status code)
 */
export function successResponse<T>(
    body: T,
    statusCode: number = 200,
    additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
    return createResponse(statusCode, body, additionalHeaders);
}

/**
 * Creates an error response (4xx, 5xx status code)
 */
export function errorResponse(
    message: string,
    statusCode: number = 500,
    additionalData: Record<string, unknown> = {},
    additionalHeaders: Record<string, string> = {}
): APIGatewayProxyResult {
    return createResponse(
        statusCode,
        {
            error: message,
            ...additionalData,
        },
        additionalHeaders
    );
}

/**
 * Maps a failure from the portal client onto its HTTP response
 */
export function portalErrorResponse(error: unknown): APIGatewayProxyResult {
    if (error instanceof NotFoundError) {
        return errorResponse(error.message, 400, { code: error.code, suggestions: error.suggestions });
    }
    if (error instanceof InvalidSearchError) {
        return errorResponse(error.message, 400, { code: error.code, field: error.field });
    }
    if (error instanceof EmptyListingError) {
        return errorResponse(error.message, 404, { code: error.code });
    }
    if (error instanceof CaptchaRequiredError) {
        return createResponse(503, { error: error.code, captcha: true, message: error.message });
    }
    if (error instanceof PortalTimeoutError) {
        return errorResponse('Portal timed out', 504, { code: error.code, message: error.message });
    }
    if (error instanceof TransportFailureError) {
        return errorResponse('Portal unavailable', 502, { code: error.code, message: error.message });
    }

    return errorResponse('Internal server error', 500, {
        message: error instanceof Error ? error.message : String(error),
    });
}
