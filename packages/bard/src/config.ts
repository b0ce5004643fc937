import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { Dict, Schema } from 'koishi'
import { DEFAULT_BUILD_LABEL } from './utils'

export interface Config {
    token: string
    tokenFromBrowser: boolean
    multiCookies: boolean
    cookies: Dict<string>

    timeout: number
    proxies: Dict<string>
    buildLabel: string
    fallbackLineOffsets: number[]

    conversationId: string
    language: string
    translatorApiKey: string
    runCode: boolean
}

export const Config: Schema<Config> = Schema.intersect([
    Schema.object({
        token: Schema.string()
            .role('secret')
            .description('Value of the __Secure-1PSID cookie'),
        tokenFromBrowser: Schema.boolean().description(
            'Read the credential from the injected browser cookie source'
        ),
        multiCookies: Schema.boolean().description(
            'Require __Secure-1PSID, __Secure-1PSIDTS, __Secure-1PSIDCC and NID from the browser'
        ),
        cookies: Schema.dict(Schema.string().role('secret')).description(
            'Extra cookies sent with every request'
        )
    }).description('Credentials'),

    Schema.object({
        timeout: Schema.natural().description('Request timeout in ms'),
        proxies: Schema.dict(Schema.string()).description(
            'Proxy address per scheme (https, http, all)'
        ),
        buildLabel: Schema.string().description(
            'Build label used when the landing page does not expose one'
        ),
        fallbackLineOffsets: Schema.array(Schema.number()).description(
            'Line offsets from the end of the body tried when no marker line decodes'
        )
    }).description('Requests'),

    Schema.object({
        conversationId: Schema.string().description(
            'Conversation to resume'
        ),
        language: Schema.string().description(
            'Answer language; unsupported languages are pivoted through English'
        ),
        translatorApiKey: Schema.string()
            .role('secret')
            .description('Google Cloud Translation API key'),
        runCode: Schema.boolean().description(
            'Hand fenced code blocks to the injected code runner'
        )
    }).description('Conversation')
])

export const DEFAULT_CONFIG: Readonly<Config> = {
    token: '',
    tokenFromBrowser: false,
    multiCookies: false,
    cookies: {},

    timeout: 20000,
    proxies: {},
    buildLabel: DEFAULT_BUILD_LABEL,
    fallbackLineOffsets: [-5, -7],

    conversationId: '',
    language: '',
    translatorApiKey: '',
    runCode: false
}

export type BardOptions = Partial<Config>

export function resolveConfig(
    options: BardOptions = {},
    env: NodeJS.ProcessEnv = process.env
): Config {
    const merged: Config = {
        ...DEFAULT_CONFIG,
        ...stripUndefined(options),
        language: options.language ?? env['_BARD_API_LANG'] ?? ''
    }

    try {
        return Config(merged)
    } catch (e) {
        throw new BardKitError(
            BardKitErrorCode.NOT_AVAILABLE_CONFIG,
            e instanceof Error ? e : new Error(String(e))
        )
    }
}

function stripUndefined(options: BardOptions): BardOptions {
    const result: BardOptions = {}

    for (const [key, value] of Object.entries(options)) {
        if (value !== undefined) {
            Object.assign(result, { [key]: value })
        }
    }

    return result
}
