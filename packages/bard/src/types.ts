import type { BardKitError } from '@bardkit/core/utils/error'
import type { Dict } from 'koishi'
import type { Tool } from './utils'

/** Any value the front end nests inside its positional arrays. */
export type TreeValue =
    | null
    | boolean
    | number
    | string
    | TreeValue[]
    | { [key: string]: TreeValue }

export interface BardWebRequestInfo {
    at: string // anti-CSRF nonce (SNlM0e)
    bl: string // build label (cfb2h)
    sid: string | null // front-end session id (FdrFJe)
}

export interface ConversationSnapshot {
    conversationId: string
    responseId: string
    choiceId: string
    requestId: number
}

export interface BardChoice {
    id: string
    content: TreeValue[]
}

export interface BardAnswer {
    content: string
    conversationId: string
    responseId: string
    factualityQueries: TreeValue
    textQuery: string
    choices: BardChoice[]
    links: string[]
    images: string[]
    programLang: string | null
    code: string | null
    statusCode: number
}

/**
 * Returned by `getAnswer` when no line of the body carried a payload.
 * The conversation state is left untouched.
 */
export interface BardEmptyResponse {
    content: string
    statusCode: number
    error: BardKitError
}

export interface BardSpeech {
    audio: Buffer
    statusCode: number
}

export interface BardExport {
    url: string
    statusCode: number
}

export interface AnswerOptions {
    image?: Buffer
    imageName?: string
    tool?: Tool
}

export interface ExportReplitOptions {
    filename?: string
    instructions?: string
    sourcePath?: string
}

export interface BrowserCookieSource {
    /**
     * Reads the front end's cookies from a local browser profile.
     * With `multiCookies` the whole rotating set is expected, not only `__Secure-1PSID`.
     */
    extract(multiCookies: boolean): Promise<Dict<string>>
}

export interface ImageUploader {
    /** Uploads the image and resolves to the file location the front end refers to. */
    upload(image: Buffer, filename: string): Promise<string>
}

export interface CodeRunner {
    run(code: string, language: string | null): Promise<void>
}
