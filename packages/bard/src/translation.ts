import { createLogger } from '@bardkit/core/utils/logger'
import {
    GoogleCloudTranslator,
    GoogleWebTranslator,
    NoopTranslator,
    type Translator,
    type TranslatorOptions
} from '@bardkit/translator'
import type { Config } from './config'
import type { BardChoice, TreeValue } from './types'
import { ALLOWED_LANGUAGES, PIVOT_LANGUAGE } from './utils'

const logger = createLogger('bard/translation')

export function isTranslationNeeded(language: string | null | undefined) {
    return (
        language != null &&
        language.length > 0 &&
        !ALLOWED_LANGUAGES.has(language.toLowerCase())
    )
}

export function createTranslator(
    config: Pick<Config, 'language' | 'translatorApiKey'>,
    options: TranslatorOptions = {}
): Translator {
    if (!config.language) {
        return new NoopTranslator()
    }

    if (config.translatorApiKey) {
        return new GoogleCloudTranslator({
            ...options,
            apiKey: config.translatorApiKey
        })
    }

    return new GoogleWebTranslator(options)
}

/**
 * Pivots prompts to English and answers back to `language` when the front
 * end does not speak `language` itself. A failed translation keeps the
 * original text and is only logged.
 */
export class TranslationAdapter {
    constructor(
        private _translator: Translator,
        private _language: string | null
    ) {}

    get language() {
        return this._language
    }

    get active() {
        return isTranslationNeeded(this._language)
    }

    async outbound(text: string): Promise<string> {
        if (!this.active) {
            return text
        }

        return this._translate(text, PIVOT_LANGUAGE)
    }

    async inbound(choices: BardChoice[]): Promise<BardChoice[]> {
        const target = this._language

        if (!this.active || target == null) {
            return choices
        }

        const result: BardChoice[] = []

        for (const choice of choices) {
            const content: TreeValue[] = []

            for (const fragment of choice.content) {
                content.push(
                    typeof fragment === 'string'
                        ? await this._translate(fragment, target)
                        : fragment
                )
            }

            result.push({ id: choice.id, content })
        }

        return result
    }

    private async _translate(text: string, target: string) {
        try {
            return await this._translator.translate(text, target)
        } catch (e) {
            logger.warn(
                `Translation with ${this._translator.name} failed, the original text has been returned: ${e}`
            )
            return text
        }
    }
}
