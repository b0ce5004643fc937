import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import {
    bardKitFetch,
    type Fetcher,
    type Headers,
    type Response
} from '@bardkit/core/utils/request'
import type { Dict } from 'koishi'
import { type BardCredential, serializeCookies } from './auth'
import type { BardWebRequestInfo } from './types'
import { LANDING_PAGE_URL, SESSION_HEADERS } from './utils'

const logger = createLogger('bard/session')

export interface BardSessionOptions {
    credential: BardCredential
    timeout: number
    proxyAddress: string | null
    buildLabel: string
    fetch?: Fetcher
    headers?: Dict<string>
}

export interface SessionRequest {
    params?: Dict<string>
    form?: Dict<string>
    body?: string | Buffer
    headers?: Dict<string>
    /** Sends only `headers`: no cookies and no front-end headers. For third-party hosts. */
    anonymous?: boolean
}

export interface SessionResponse {
    status: number
    ok: boolean
    headers: Headers
    text: string
}

/**
 * A cookie carrying HTTP session bound to one credential.
 * Every call goes through the same fetcher with the same cookies, proxy and timeout.
 */
export class BardSession {
    private _webRequestInfo: BardWebRequestInfo | null = null

    private _fetch: Fetcher

    private _headers: Dict<string>

    constructor(private _options: BardSessionOptions) {
        this._fetch = _options.fetch ?? bardKitFetch
        this._headers = { ...SESSION_HEADERS, ..._options.headers }
    }

    get isOpen() {
        return this._webRequestInfo != null
    }

    get webRequestInfo(): BardWebRequestInfo {
        if (this._webRequestInfo == null) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error('The session has not been opened yet')
            )
        }

        return this._webRequestInfo
    }

    /**
     * Fetches the landing page and scrapes the anti-CSRF nonce from it.
     * Calling it again refreshes the nonce.
     */
    async open(): Promise<BardWebRequestInfo> {
        const response = await this.get(LANDING_PAGE_URL)

        if (response.status !== 200) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(
                    `Response status code is not 200. Response status is ${response.status}`
                )
            )
        }

        const info = extractWebRequestInfo(
            response.text,
            this._options.buildLabel
        )

        if (info == null) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(
                    'SNlM0e token value not found. The cookies are probably stale: re-login in the browser and copy fresh cookie values'
                )
            )
        }

        logger.info(
            `session opened with build label ${info.bl}, credential from ${this._options.credential.source}`
        )

        this._webRequestInfo = info

        return info
    }

    async refresh() {
        this._webRequestInfo = null
        return this.open()
    }

    async get(url: string, request: SessionRequest = {}) {
        return this._request('GET', url, request)
    }

    async post(url: string, request: SessionRequest = {}) {
        return this._request('POST', url, request)
    }

    private async _request(
        method: 'GET' | 'POST',
        url: string,
        request: SessionRequest
    ): Promise<SessionResponse> {
        const target =
            request.params != null
                ? `${url}?${new URLSearchParams(request.params).toString()}`
                : url

        const body =
            request.form != null
                ? new URLSearchParams(request.form).toString()
                : request.body

        let response: Response
        let text: string

        try {
            response = await this._fetch(
                target,
                {
                    method,
                    headers: request.anonymous
                        ? { ...request.headers }
                        : this._buildHeaders(request.headers),
                    body,
                    signal: AbortSignal.timeout(this._options.timeout)
                },
                this._options.proxyAddress
            )
            text = await response.text()
        } catch (e) {
            if (
                e instanceof Error &&
                (e.name === 'TimeoutError' || e.name === 'AbortError')
            ) {
                throw new BardKitError(
                    BardKitErrorCode.API_REQUEST_TIMEOUT,
                    new Error(
                        `${method} ${url} timed out after ${this._options.timeout}ms`,
                        { cause: e }
                    )
                )
            }

            if (e instanceof BardKitError) {
                throw e
            }

            throw new BardKitError(
                BardKitErrorCode.NETWORK_ERROR,
                e instanceof Error ? e : new Error(String(e))
            )
        }

        logger.debug(`${method} ${url} -> ${response.status}`)

        return {
            status: response.status,
            ok: response.ok,
            headers: response.headers,
            text
        }
    }

    private _buildHeaders(headers?: Dict<string>): Dict<string> {
        return {
            ...this._headers,
            ...headers,
            Cookie: serializeCookies(this._options.credential.cookies)
        }
    }
}

export function extractWebRequestInfo(
    html: string,
    fallbackBuildLabel: string
): BardWebRequestInfo | null {
    const at =
        html.match(/"SNlM0e":"(.*?)"/)?.[1] ?? html.match(/nonce="([^"]+)"/)?.[1]

    if (at == null) {
        return null
    }

    return {
        at,
        bl: html.match(/"cfb2h":"(.*?)"/)?.[1] ?? fallbackBuildLabel,
        sid: html.match(/"FdrFJe":"(.*?)"/)?.[1] ?? null
    }
}
