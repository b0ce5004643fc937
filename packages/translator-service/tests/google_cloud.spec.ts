import { BardKitErrorCode } from '@bardkit/core/utils/error'
import { type Fetcher, Response } from '@bardkit/core/utils/request'
import { describe, expect, it } from 'vitest'
import { GoogleCloudTranslator } from '../src/providers/google_cloud'
import { NoopTranslator } from '../src/providers/noop'

interface RecordedRequest {
    url: string
    body: string | undefined
}

function createFetch(status: number, body: string) {
    const requests: RecordedRequest[] = []

    const fetch: Fetcher = async (info, init) => {
        requests.push({
            url: String(info),
            body: typeof init?.body === 'string' ? init.body : undefined
        })
        return new Response(body, { status })
    }

    return { fetch, requests }
}

describe('GoogleCloudTranslator', () => {
    it('posts the text with the api key', async () => {
        const { fetch, requests } = createFetch(
            200,
            '{"data":{"translations":[{"translatedText":"Hallo"}]}}'
        )

        const translator = new GoogleCloudTranslator({
            apiKey: 'test-secret',
            fetch
        })

        await expect(translator.translate('Hello', 'de')).resolves.toBe(
            'Hallo'
        )

        expect(requests[0].url).toBe(
            'https://translation.googleapis.com/language/translate/v2?key=test-secret'
        )
        expect(JSON.parse(requests[0].body ?? '')).toEqual({
            q: 'Hello',
            target: 'de',
            format: 'text'
        })
    })

    it('sends the source language when it is known', async () => {
        const { fetch, requests } = createFetch(
            200,
            '{"data":{"translations":[{"translatedText":"Hello"}]}}'
        )

        const translator = new GoogleCloudTranslator({
            apiKey: 'test-secret',
            fetch
        })

        await translator.translate('Hallo', 'en', 'de')

        expect(JSON.parse(requests[0].body ?? '')).toEqual({
            q: 'Hallo',
            target: 'en',
            format: 'text',
            source: 'de'
        })
    })

    it('fails when no translation comes back', async () => {
        const { fetch } = createFetch(200, '{"data":{"translations":[]}}')

        const translator = new GoogleCloudTranslator({
            apiKey: 'test-secret',
            fetch
        })

        await expect(translator.translate('Hello', 'de')).rejects.toMatchObject(
            { errorCode: BardKitErrorCode.TRANSLATION_FAILED }
        )
    })

    it('fails on a rejected key', async () => {
        const { fetch } = createFetch(403, '{"error":{"code":403}}')

        const translator = new GoogleCloudTranslator({
            apiKey: 'test-secret',
            fetch
        })

        await expect(translator.translate('Hello', 'de')).rejects.toMatchObject(
            { errorCode: BardKitErrorCode.TRANSLATION_FAILED }
        )
    })
})

describe('NoopTranslator', () => {
    it('returns the text unchanged', async () => {
        await expect(
            new NoopTranslator().translate('안녕하세요', 'en')
        ).resolves.toBe('안녕하세요')
    })
})
