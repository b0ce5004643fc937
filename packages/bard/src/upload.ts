import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import type { BardSession } from './session'
import type { ImageUploader } from './types'
import { IMAGE_UPLOAD_HEADERS, IMAGE_UPLOAD_URL } from './utils'

const logger = createLogger('bard/upload')

/**
 * Two phase resumable upload: `start` returns an upload URL,
 * `upload, finalize` sends the bytes and answers with the file location.
 */
export class GoogleImageUploader implements ImageUploader {
    constructor(private _session: BardSession) {}

    async upload(image: Buffer, filename: string): Promise<string> {
        logger.debug(`Uploading image ${filename}`)

        const start = await this._session.post(IMAGE_UPLOAD_URL, {
            anonymous: true,
            headers: {
                ...IMAGE_UPLOAD_HEADERS,
                'X-Goog-Upload-Command': 'start',
                'X-Goog-Upload-Protocol': 'resumable',
                'X-Goog-Upload-Header-Content-Length':
                    image.byteLength.toString()
            },
            body: `File name: ${filename}`
        })

        const uploadUrl = start.headers.get('X-Goog-Upload-URL')

        if (!start.ok || uploadUrl == null) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(
                    `Image upload could not start, status ${start.status}`
                )
            )
        }

        const finalize = await this._session.post(uploadUrl, {
            anonymous: true,
            headers: {
                ...IMAGE_UPLOAD_HEADERS,
                'X-Goog-Upload-Command': 'upload, finalize',
                'X-Goog-Upload-Offset': '0'
            },
            body: image
        })

        if (!finalize.ok) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(
                    `Image upload could not finalize, status ${finalize.status}`
                )
            )
        }

        const location = finalize.text.trim()

        logger.debug(`image file location: ${location}`)

        return location
    }
}
