import { Translator } from '../provide'

/** Returns every text unchanged. Used when no target language is set. */
export class NoopTranslator extends Translator {
    name = 'noop'

    async translate(text: string): Promise<string> {
        return text
    }
}
