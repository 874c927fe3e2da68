/**
 * OAuth Server - Protocol Failure Logger
 *
 * One JSON line on stdout per failed request, which Lambda routes to
 * CloudWatch. Client-side rejections (4xx) are logged at WARN, server
 * errors (5xx) at ERROR. The message of an unclassified cause is logged
 * here and never rendered to the client.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import { ProtocolErrorException } from './errors/exception';
import { HttpStatus } from './errors/http-status';
import type { ProtocolError } from './errors/protocol-error';
import { isProtocolError } from './type-guards';

export type LogLevel = 'WARN' | 'ERROR';

export interface FailureDetails {
    code: number;
    errorType: string;
    httpStatusCode: number;
    /** Message of the original failure when it was not a protocol error */
    cause?: string;
}

export interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data: FailureDetails;
}

const LOG_MESSAGES: Record<LogLevel, string> = {
    WARN: 'Request rejected',
    ERROR: 'Request failed with server error',
};

/**
 * WARN for client errors, ERROR for server errors.
 */
export function levelFor(error: ProtocolError): LogLevel {
    return error.httpStatusCode >= HttpStatus.INTERNAL_SERVER_ERROR ? 'ERROR' : 'WARN';
}

function describeCause(cause: unknown): string | undefined {
    if (cause === undefined || cause instanceof ProtocolErrorException || isProtocolError(cause)) {
        return undefined;
    }
    return cause instanceof Error ? cause.message : String(cause);
}

export class ErrorLogger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    /**
     * Log the failure a request ended with.
     *
     * @param cause - What the handler threw, when it differs from `error`
     * @returns The entry written
     */
    failure(error: ProtocolError, cause?: unknown): LogEntry {
        const level = levelFor(error);
        const data: FailureDetails = {
            code: error.code,
            errorType: error.errorType,
            httpStatusCode: error.httpStatusCode,
        };

        const causeMessage = describeCause(cause);
        if (causeMessage !== undefined) {
            data.cause = causeMessage;
        }

        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message: LOG_MESSAGES[level],
            data,
        };

        console.log(JSON.stringify(entry));
        return entry;
    }
}

/**
 * Create an ErrorLogger for an API Gateway HTTP API v2 request.
 *
 * The Lambda request ID wins over the gateway's, then an `x-request-id`
 * header.
 */
export function createErrorLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): ErrorLogger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    return new ErrorLogger(requestId);
}
