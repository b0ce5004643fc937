import { BardKitErrorCode } from '@bardkit/core/utils/error'
import type { Dict } from 'koishi'
import { describe, expect, it } from 'vitest'
import {
    resolveCredential,
    serializeCookies,
    TOKEN_COOKIE,
    TOKEN_ENV
} from '../src/auth'
import type { BrowserCookieSource } from '../src/types'

const BASE = {
    token: '',
    tokenFromBrowser: false,
    multiCookies: false,
    cookies: {}
}

class StaticCookieSource implements BrowserCookieSource {
    calls: boolean[] = []

    constructor(private _cookies: Dict<string>) {}

    async extract(multiCookies: boolean) {
        this.calls.push(multiCookies)
        return this._cookies
    }
}

describe('resolveCredential', () => {
    it('prefers the explicit token', async () => {
        const browser = new StaticCookieSource({ [TOKEN_COOKIE]: 'browser-token' })

        const credential = await resolveCredential(
            { ...BASE, token: 'test-secret', tokenFromBrowser: true },
            { [TOKEN_ENV]: 'env-token' },
            browser
        )

        expect(credential.token).toBe('test-secret')
        expect(credential.source).toBe('explicit')
        expect(credential.cookies).toEqual({ [TOKEN_COOKIE]: 'test-secret' })
        expect(browser.calls).toEqual([])
    })

    it('falls back to the environment', async () => {
        const credential = await resolveCredential(BASE, {
            [TOKEN_ENV]: 'env-token'
        })

        expect(credential.token).toBe('env-token')
        expect(credential.source).toBe('env')
    })

    it('reads the browser last', async () => {
        const browser = new StaticCookieSource({
            [TOKEN_COOKIE]: 'browser-token',
            NID: 'test-nid'
        })

        const credential = await resolveCredential(
            { ...BASE, tokenFromBrowser: true, cookies: { extra: '1' } },
            {},
            browser
        )

        expect(credential.source).toBe('browser')
        expect(credential.cookies).toEqual({
            extra: '1',
            [TOKEN_COOKIE]: 'browser-token',
            NID: 'test-nid'
        })
        expect(browser.calls).toEqual([false])
    })

    it('needs every rotating cookie in multi cookie mode', async () => {
        const browser = new StaticCookieSource({
            [TOKEN_COOKIE]: 'browser-token',
            NID: 'test-nid'
        })

        await expect(
            resolveCredential(
                { ...BASE, tokenFromBrowser: true, multiCookies: true },
                {},
                browser
            )
        ).rejects.toThrow(
            'Essential cookies are missing: __Secure-1PSIDTS, __Secure-1PSIDCC'
        )
    })

    it('needs a cookie source to read the browser', async () => {
        await expect(
            resolveCredential({ ...BASE, tokenFromBrowser: true }, {})
        ).rejects.toMatchObject({
            errorCode: BardKitErrorCode.AUTHENTICATION_FAILED
        })
    })

    it('fails without any credential', async () => {
        await expect(resolveCredential(BASE, {})).rejects.toMatchObject({
            errorCode: BardKitErrorCode.AUTHENTICATION_FAILED
        })
    })
})

describe('serializeCookies', () => {
    it('joins name value pairs', () => {
        expect(serializeCookies({ a: '1', b: '2' })).toBe('a=1; b=2')
    })
})
