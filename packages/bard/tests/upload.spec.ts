import { BardKitErrorCode } from '@bardkit/core/utils/error'
import { Response } from '@bardkit/core/utils/request'
import { describe, expect, it } from 'vitest'
import { BardSession } from '../src/session'
import { GoogleImageUploader } from '../src/upload'
import { createFakeFetch, type Handler } from './fixtures'

const UPLOAD_URL = 'https://content-push.googleapis.com/upload/?upload_id=test-upload'

function createUploader(handler: Handler) {
    const { fetch, requests } = createFakeFetch(handler)

    const session = new BardSession({
        credential: {
            token: 'test-secret',
            cookies: { '__Secure-1PSID': 'test-secret' },
            source: 'explicit'
        },
        timeout: 1000,
        proxyAddress: null,
        buildLabel: 'boq_test',
        fetch
    })

    return { uploader: new GoogleImageUploader(session), requests }
}

describe('GoogleImageUploader', () => {
    it('runs the resumable upload', async () => {
        const { uploader, requests } = createUploader((request) =>
            request.headers.get('x-goog-upload-command') === 'start'
                ? new Response('', { headers: { 'X-Goog-Upload-URL': UPLOAD_URL } })
                : new Response('/contrib_service/ttl_1d/test-file\n')
        )

        await expect(
            uploader.upload(Buffer.from([1, 2, 3]), 'cat.jpg')
        ).resolves.toBe('/contrib_service/ttl_1d/test-file')

        expect(requests).toHaveLength(2)
        expect(requests[0].url.href).toBe(
            'https://content-push.googleapis.com/upload/'
        )
        expect(requests[0].body).toBe('File name: cat.jpg')
        expect(requests[0].headers.get('x-goog-upload-protocol')).toBe(
            'resumable'
        )
        expect(
            requests[0].headers.get('x-goog-upload-header-content-length')
        ).toBe('3')
        expect(requests[1].url.href).toBe(UPLOAD_URL)
        expect(requests[1].headers.get('x-goog-upload-command')).toBe(
            'upload, finalize'
        )
        expect(requests[1].headers.get('x-goog-upload-offset')).toBe('0')
    })

    it('keeps the session cookies off the upload host', async () => {
        const { uploader, requests } = createUploader((request) =>
            request.headers.get('x-goog-upload-command') === 'start'
                ? new Response('', { headers: { 'X-Goog-Upload-URL': UPLOAD_URL } })
                : new Response('/contrib_service/ttl_1d/test-file')
        )

        await uploader.upload(Buffer.from([1]), 'cat.jpg')

        expect(requests).toHaveLength(2)

        for (const request of requests) {
            expect(request.headers.get('cookie')).toBeNull()
            expect(request.headers.get('x-same-domain')).toBeNull()
            expect(request.headers.get('x-tenant-id')).toBe('bard-storage')
        }
    })

    it('fails without an upload URL', async () => {
        const { uploader, requests } = createUploader(() => new Response(''))

        await expect(
            uploader.upload(Buffer.from([1]), 'cat.jpg')
        ).rejects.toMatchObject({
            errorCode: BardKitErrorCode.API_REQUEST_FAILED
        })
        expect(requests).toHaveLength(1)
    })
})
