import { socksDispatcher } from 'fetch-socks'
import {
    fetch,
    ProxyAgent,
    type RequestInfo,
    type RequestInit,
    type Response
} from 'undici'
import { BardKitError, BardKitErrorCode } from './error'
import { createLogger } from './logger'

export { Headers, Response } from 'undici'
export type { RequestInfo, RequestInit } from 'undici'

const logger = createLogger('request')

export type Fetcher = (
    info: RequestInfo,
    init?: RequestInit,
    proxyAddress?: string | null
) => Promise<Response>

function createProxyAgentForFetch(
    init: RequestInit,
    proxyAddress: string
): RequestInit {
    if (init.dispatcher) {
        return init
    }

    let proxyAddressURL: URL

    try {
        proxyAddressURL = new URL(proxyAddress)
    } catch (e) {
        logger.error(
            'Unable to parse the proxy address, check that it carries a scheme (for example http://)'
        )
        logger.error(e)
        throw e
    }

    if (proxyAddress.startsWith('socks://')) {
        init.dispatcher = socksDispatcher({
            type: 5,
            host: proxyAddressURL.hostname,
            port: proxyAddressURL.port ? parseInt(proxyAddressURL.port) : 1080
        })
        // match http/https
    } else if (proxyAddress.match(/^https?:\/\//)) {
        init.dispatcher = new ProxyAgent({
            uri: proxyAddress
        })
    } else {
        throw new BardKitError(
            BardKitErrorCode.UNSUPPORTED_PROXY_PROTOCOL,
            new Error('Unsupported proxy protocol')
        )
    }

    return init
}

/**
 * Picks the proxy address from a scheme keyed proxy map.
 * `https` wins over `all`, which wins over `http`.
 */
export function resolveProxyAddress(
    proxies: Record<string, string> | null | undefined
): string | null {
    if (proxies == null) {
        return null
    }

    for (const key of ['https', 'all', 'http']) {
        const address = proxies[key]
        if (address != null && address.length > 0) {
            return address
        }
    }

    return null
}

/**
 * package undici, and with proxy support
 * @returns
 */
export async function bardKitFetch(
    info: RequestInfo,
    init?: RequestInit,
    proxyAddress: string | null = null
): Promise<Response> {
    if (proxyAddress != null && !init?.dispatcher) {
        init = createProxyAgentForFetch(init || {}, proxyAddress)
    }

    try {
        return await fetch(info, init)
    } catch (e) {
        if (e instanceof Error && e.cause) {
            logger.error(e.cause)
        }
        throw e
    }
}
