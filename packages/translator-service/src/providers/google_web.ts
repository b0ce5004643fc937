import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import type { Response } from '@bardkit/core/utils/request'
import { createLogger } from '@bardkit/core/utils/logger'
import { Translator } from '../provide'

const logger = createLogger('translator/google-web')

const ENDPOINT = 'https://translate.googleapis.com/translate_a/single'

/**
 * Keyless translator backed by the public web widget endpoint.
 *
 * The endpoint answers with `[[[translated, original, ...], ...], null, detectedLang, ...]`,
 * one inner entry per sentence.
 */
export class GoogleWebTranslator extends Translator {
    name = 'google-web'

    async translate(
        text: string,
        target: string,
        source: string = 'auto'
    ): Promise<string> {
        if (text.trim().length === 0) {
            return text
        }

        const params = new URLSearchParams({
            client: 'gtx',
            sl: source,
            tl: target,
            dt: 't',
            q: text
        })

        let response: Response

        try {
            response = await this._fetch(
                `${ENDPOINT}?${params.toString()}`,
                {
                    method: 'GET',
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
                    `google-web translate returned ${response.status}: ${body.slice(0, 200)}`
                )
            )
        }

        logger.debug(`google-web translate response: ${body}`)

        return parseSentences(body)
    }
}

export function parseSentences(body: string): string {
    let parsed: unknown

    try {
        parsed = JSON.parse(body)
    } catch (e) {
        throw new BardKitError(
            BardKitErrorCode.TRANSLATION_FAILED,
            new Error(`google-web translate returned malformed JSON`, {
                cause: e
            })
        )
    }

    if (!Array.isArray(parsed) || !Array.isArray(parsed[0])) {
        throw new BardKitError(
            BardKitErrorCode.TRANSLATION_FAILED,
            new Error('google-web translate returned no sentences')
        )
    }

    const sentences: string[] = []

    for (const sentence of parsed[0]) {
        if (Array.isArray(sentence) && typeof sentence[0] === 'string') {
            sentences.push(sentence[0])
        }
    }

    return sentences.join('')
}
