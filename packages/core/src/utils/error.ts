import { createLogger } from './logger'

export const ERROR_FORMAT_TEMPLATE =
    'An error occurred while using BardKit (error code %s)'

const logger = createLogger()

export class BardKitError extends Error {
    constructor(
        public errorCode: BardKitErrorCode = BardKitErrorCode.UNKNOWN_ERROR,
        public originError?: Error
    ) {
        super(formatErrorMessage(errorCode, originError))
        this.name = 'BardKitError'
        logger.error(
            '='.repeat(20) + 'BardKitError:' + errorCode + '='.repeat(20)
        )
        if (originError) {
            logger.error(originError)
            if (originError.cause) {
                logger.error(originError.cause)
            }
        }
    }

    public toString() {
        return this.message
    }
}

function formatErrorMessage(errorCode: BardKitErrorCode, originError?: Error) {
    const message = ERROR_FORMAT_TEMPLATE.replace('%s', errorCode.toString())

    return originError ? `${message}: ${originError.message}` : message
}

export function isBardKitError(
    error: unknown,
    errorCode?: BardKitErrorCode
): error is BardKitError {
    return (
        error instanceof BardKitError &&
        (errorCode == null || error.errorCode === errorCode)
    )
}

export enum BardKitErrorCode {
    NETWORK_ERROR = 1,
    UNSUPPORTED_PROXY_PROTOCOL = 2,
    AUTHENTICATION_FAILED = 100,
    API_REQUEST_TIMEOUT = 102,
    API_REQUEST_FAILED = 103,
    UPSTREAM_EMPTY_RESPONSE = 104,
    RESPONSE_PARSE_ERROR = 105,
    UNSUPPORTED_PROGRAM_LANGUAGE = 106,
    TRANSLATION_FAILED = 200,
    NOT_AVAILABLE_CONFIG = 307,
    UNKNOWN_ERROR = 999
}
