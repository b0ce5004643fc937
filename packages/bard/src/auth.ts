import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import type { Dict } from 'koishi'
import type { Config } from './config'
import type { BrowserCookieSource } from './types'
import { REQUIRED_COOKIES } from './utils'

const logger = createLogger('bard/auth')

export const TOKEN_COOKIE = '__Secure-1PSID'

export const TOKEN_ENV = '_BARD_API_KEY'

export interface BardCredential {
    token: string
    // every cookie to attach, the token cookie included
    cookies: Dict<string>
    source: 'explicit' | 'env' | 'browser'
}

/**
 * Resolves the credential in order of precedence:
 * explicit token, then the `_BARD_API_KEY` environment variable,
 * then the browser cookie source when `tokenFromBrowser` is set.
 */
export async function resolveCredential(
    config: Pick<
        Config,
        'token' | 'tokenFromBrowser' | 'multiCookies' | 'cookies'
    >,
    env: NodeJS.ProcessEnv = process.env,
    browserCookies?: BrowserCookieSource
): Promise<BardCredential> {
    if (config.token) {
        return createCredential(config.token, config.cookies, 'explicit')
    }

    const envToken = env[TOKEN_ENV]
    if (envToken) {
        return createCredential(envToken, config.cookies, 'env')
    }

    if (config.tokenFromBrowser) {
        if (browserCookies == null) {
            throw new BardKitError(
                BardKitErrorCode.AUTHENTICATION_FAILED,
                new Error(
                    'tokenFromBrowser is set but no browser cookie source was provided'
                )
            )
        }

        const extracted = await browserCookies.extract(config.multiCookies)

        if (config.multiCookies) {
            const missing = REQUIRED_COOKIES.filter(
                (name) => !extracted[name]
            )

            if (missing.length > 0) {
                throw new BardKitError(
                    BardKitErrorCode.AUTHENTICATION_FAILED,
                    new Error(
                        `Essential cookies are missing: ${missing.join(', ')}`
                    )
                )
            }
        }

        const token = extracted[TOKEN_COOKIE]

        if (token) {
            logger.debug(
                `resolved credential from browser with ${Object.keys(extracted).length} cookies`
            )
            return createCredential(
                token,
                { ...config.cookies, ...extracted },
                'browser'
            )
        }
    }

    throw new BardKitError(
        BardKitErrorCode.AUTHENTICATION_FAILED,
        new Error(
            `A credential must be provided as the token option, the ${TOKEN_ENV} environment variable, or extracted from the browser`
        )
    )
}

function createCredential(
    token: string,
    cookies: Dict<string>,
    source: BardCredential['source']
): BardCredential {
    return {
        token,
        cookies: { ...cookies, [TOKEN_COOKIE]: token },
        source
    }
}

export function serializeCookies(cookies: Dict<string>) {
    return Object.entries(cookies)
        .map(([name, value]) => `${name}=${value}`)
        .join('; ')
}
