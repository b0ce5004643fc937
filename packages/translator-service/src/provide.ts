import { bardKitFetch, type Fetcher } from '@bardkit/core/utils/request'

export interface TranslatorOptions {
    fetch?: Fetcher
    proxyAddress?: string | null
    /** Per-request timeout in milliseconds. */
    timeout?: number
}

export abstract class Translator {
    protected _fetch: Fetcher

    constructor(protected options: TranslatorOptions = {}) {
        this._fetch = options.fetch ?? bardKitFetch
    }

    /**
     * Translates `text` into the `target` language.
     * `source` defaults to automatic detection.
     */
    abstract translate(
        text: string,
        target: string,
        source?: string
    ): Promise<string>

    abstract name: string

    protected _signal() {
        return this.options.timeout != null
            ? AbortSignal.timeout(this.options.timeout)
            : undefined
    }
}
