import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import type { Response } from '@bardkit/core/utils/request'
import { createLogger } from '@bardkit/core/utils/logger'
import { Translator, type TranslatorOptions } from '../provide'

const logger = createLogger('translator/google-cloud')

const ENDPOINT = 'https://translation.googleapis.com/language/translate/v2'

export interface GoogleCloudTranslatorOptions extends TranslatorOptions {
    apiKey: string
}

interface TranslateV2Response {
    data?: {
        translations?: {
            translatedText?: unknown
        }[]
    }
}

/** Google Cloud Translation (v2 REST) with an API key. */
export class GoogleCloudTranslator extends Translator {
    name = 'google-cloud'

    constructor(private _cloudOptions: GoogleCloudTranslatorOptions) {
        super(_cloudOptions)
    }

    async translate(
        text: string,
        target: string,
        source: string = 'auto'
    ): Promise<string> {
        if (text.trim().length === 0) {
            return text
        }

        const requestBody: Record<string, string> = {
            q: text,
            target,
            format: 'text'
        }

        if (source !== 'auto') {
            requestBody.source = source
        }

        const url = `${ENDPOINT}?${new URLSearchParams({
            key: this._cloudOptions.apiKey
        }).toString()}`

        let response: Response

        try {
            response = await this._fetch(
                url,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json'
                    },
                    body: JSON.stringify(requestBody),
                    signal: this._signal()
                },
                this.options.proxyAddress
            )
        } catch (e) {
            throw new BardKitError(
                BardKitErrorCode.TRANSLATION_FAILED,
                e instanceof Error ? e : new Error(String(e))
            )
        }

        const body = await response.text()

        if (!response.ok) {
            throw new BardKitError(
                BardKitErrorCode.TRANSLATION_FAILED,
                new Error(
                    `google-cloud translate returned ${response.status}: ${body.slice(0, 200)}`
                )
            )
        }

        logger.debug(`google-cloud translate response: ${body}`)

        let parsed: TranslateV2Response

        try {
            parsed = JSON.parse(body)
        } catch (e) {
            throw new BardKitError(
                BardKitErrorCode.TRANSLATION_FAILED,
                new Error('google-cloud translate returned malformed JSON', {
                    cause: e
                })
            )
        }

        const translated = parsed.data?.translations?.[0]?.translatedText

        if (typeof translated !== 'string') {
            throw new BardKitError(
                BardKitErrorCode.TRANSLATION_FAILED,
                new Error('google-cloud translate returned no translation')
            )
        }

        return translated
    }
}
