import {
    BardKitError,
    BardKitErrorCode,
    isBardKitError
} from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import { type Fetcher, resolveProxyAddress } from '@bardkit/core/utils/request'
import type { Translator } from '@bardkit/translator'
import { resolveCredential } from './auth'
import { type BardOptions, type Config, resolveConfig } from './config'
import { ConversationState } from './conversation'
import { buildAnswer, decodeStreamResponse, toChoices } from './decoder'
import {
    buildAnswerRequest,
    buildExportConversationRequest,
    buildExportReplitRequest,
    buildImageQuestionRequest,
    buildSpeechRequest
} from './encoder'
import { asString, getPath, type PayloadReader } from './payload'
import { BardRequester } from './requester'
import { BardSession, type SessionResponse } from './session'
import { createTranslator, TranslationAdapter } from './translation'
import type {
    AnswerOptions,
    BardAnswer,
    BardChoice,
    BardEmptyResponse,
    BardExport,
    BardSpeech,
    BrowserCookieSource,
    CodeRunner,
    ConversationSnapshot,
    ExportReplitOptions,
    ImageUploader
} from './types'
import { GoogleImageUploader } from './upload'
import {
    REPLIT_SUPPORT_PROGRAM_LANGUAGES,
    RpcId,
    SHARE_URL_PREFIX
} from './utils'

const logger = createLogger('bard/client')

/** Collaborators the client would otherwise build itself. */
export interface BardDependencies {
    fetch?: Fetcher
    session?: BardSession
    translator?: Translator
    browserCookies?: BrowserCookieSource
    imageUploader?: ImageUploader
    codeRunner?: CodeRunner
    env?: NodeJS.ProcessEnv
}

export type BardAnswerResult = BardAnswer | BardEmptyResponse

export function isEmptyResponse(
    result: BardAnswerResult
): result is BardEmptyResponse {
    return 'error' in result
}

export class BardClient {
    private _config: Config

    private _conversation: ConversationState

    private _session: BardSession | null

    private _requester: BardRequester | null = null

    private _translation: TranslationAdapter

    private _proxyAddress: string | null

    private _lastChoices: BardChoice[] = []

    constructor(
        options: BardOptions = {},
        private _dependencies: BardDependencies = {}
    ) {
        this._config = resolveConfig(options, _dependencies.env)
        this._proxyAddress = resolveProxyAddress(this._config.proxies)
        this._session = _dependencies.session ?? null
        this._conversation = new ConversationState({
            conversationId: this._config.conversationId
        })
        this._translation = this._createTranslation(
            this._config.language || null
        )

        if (this._config.runCode && _dependencies.codeRunner == null) {
            logger.warn(
                'runCode is enabled but no code runner was provided, code blocks will not run'
            )
        }
    }

    get config(): Readonly<Config> {
        return this._config
    }

    get conversation(): Readonly<ConversationSnapshot> {
        return this._conversation.snapshot()
    }

    /** Resolves the credential and opens the session. Safe to call twice. */
    async init(): Promise<void> {
        await this._ready()
    }

    /**
     * Sends one prompt in the current conversation.
     * An empty upstream payload is reported as a `BardEmptyResponse` and leaves the conversation as it was.
     */
    async getAnswer(
        text: string,
        options: AnswerOptions = {}
    ): Promise<BardAnswerResult> {
        const response = await this._sendPrompt(text, options)

        return this._settle(response, this._translation)
    }

    /** Like `getAnswer`, but a failed status or an empty payload throws. */
    async ask(text: string, options: AnswerOptions = {}): Promise<BardAnswer> {
        const response = await this._sendPrompt(text, options)

        if (!response.ok) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(`StreamGenerate returned status ${response.status}`)
            )
        }

        const reader = decodeStreamResponse(
            response.text,
            this._config.fallbackLineOffsets
        )

        return this._complete(reader, response.status, this._translation)
    }

    /**
     * Asks about an image. `lang` overrides the configured language for this call only.
     */
    async askAboutImage(
        text: string,
        image: Buffer,
        lang?: string
    ): Promise<BardAnswerResult> {
        const requester = await this._ready()

        const translation =
            lang != null && lang !== this._config.language
                ? this._createTranslation(lang)
                : this._translation

        const prompt = await translation.outbound(text)
        const imageUrl = await this._upload(image, 'uploaded_photo.jpg')

        const struct = buildImageQuestionRequest(
            prompt,
            imageUrl,
            translation.language,
            this._conversation
        )

        const response = await requester.generate(
            struct,
            this._conversation.requestId
        )

        return this._settle(response, translation)
    }

    /** Synthesizes `text` and returns the decoded audio bytes. */
    async speech(text: string, lang: string = 'en-US'): Promise<BardSpeech> {
        const requester = await this._ready()

        const { status, payload } = await requester.execute(
            RpcId.SPEECH,
            buildSpeechRequest(text, lang),
            this._conversation.requestId
        )

        const audio = asString(getPath(payload, [0]))

        if (audio == null) {
            throw new BardKitError(
                BardKitErrorCode.RESPONSE_PARSE_ERROR,
                new Error('The speech response carries no audio')
            )
        }

        this._conversation.bump()

        return { audio: Buffer.from(audio, 'base64'), statusCode: status }
    }

    /** Shares an answered exchange and returns the public share URL. */
    async exportConversation(
        answer: Pick<BardAnswer, 'conversationId' | 'responseId' | 'choices'>,
        title: string = ''
    ): Promise<BardExport> {
        const choiceId = answer.choices[0]?.id

        if (choiceId == null) {
            throw new BardKitError(
                BardKitErrorCode.RESPONSE_PARSE_ERROR,
                new Error('The answer to export has no choice')
            )
        }

        const requester = await this._ready()

        const { status, payload } = await requester.execute(
            RpcId.EXPORT_CONVERSATION,
            buildExportConversationRequest(
                answer.conversationId,
                answer.responseId,
                choiceId,
                title
            ),
            this._conversation.requestId
        )

        const shareId = asString(getPath(payload, [2]))

        if (shareId == null) {
            throw new BardKitError(
                BardKitErrorCode.RESPONSE_PARSE_ERROR,
                new Error('The export response carries no share id')
            )
        }

        this._conversation.bump()

        return { url: SHARE_URL_PREFIX + shareId, statusCode: status }
    }

    /**
     * Exports `code` to a Replit workspace. The file name comes from
     * `options.filename` or, failing that, from `programLang`.
     */
    async exportReplit(
        code: string,
        programLang?: string | null,
        options: ExportReplitOptions = {}
    ): Promise<BardExport> {
        const filename =
            options.filename ??
            (programLang != null &&
            Object.hasOwn(REPLIT_SUPPORT_PROGRAM_LANGUAGES, programLang)
                ? REPLIT_SUPPORT_PROGRAM_LANGUAGES[programLang]
                : undefined)

        if (filename == null) {
            throw new BardKitError(
                BardKitErrorCode.UNSUPPORTED_PROGRAM_LANGUAGE,
                new Error(
                    `Language ${programLang} is not supported, please set the filename manually`
                )
            )
        }

        const requester = await this._ready()

        const { status, payload } = await requester.execute(
            RpcId.EXPORT_REPLIT,
            buildExportReplitRequest(
                options.instructions ?? '',
                code,
                filename
            ),
            this._conversation.requestId,
            options.sourcePath
        )

        const url = asString(getPath(payload, [0]))

        if (url == null) {
            throw new BardKitError(
                BardKitErrorCode.RESPONSE_PARSE_ERROR,
                new Error('The Replit export response carries no URL')
            )
        }

        this._conversation.bump()

        return { url, statusCode: status }
    }

    selectChoice(choiceId: string) {
        if (
            this._lastChoices.length > 0 &&
            !this._lastChoices.some((choice) => choice.id === choiceId)
        ) {
            throw new BardKitError(
                BardKitErrorCode.NOT_AVAILABLE_CONFIG,
                new Error(
                    `Choice ${choiceId} is not one of ${this._lastChoices
                        .map((choice) => choice.id)
                        .join(', ')}`
                )
            )
        }

        this._conversation.selectChoice(choiceId)
    }

    resetConversation() {
        this._conversation.reset()
        this._lastChoices = []
    }

    restoreConversation(snapshot: ConversationSnapshot) {
        this._conversation.restore(snapshot)
        this._lastChoices = []
    }

    /** Scrapes a fresh nonce, for when the upstream starts rejecting it. */
    async refreshSession(): Promise<void> {
        if (this._session == null) {
            await this._ready()
            return
        }

        await this._session.refresh()
    }

    private async _ready(): Promise<BardRequester> {
        if (this._session == null) {
            const credential = await resolveCredential(
                this._config,
                this._dependencies.env,
                this._dependencies.browserCookies
            )

            this._session = new BardSession({
                credential,
                timeout: this._config.timeout,
                proxyAddress: this._proxyAddress,
                buildLabel: this._config.buildLabel,
                fetch: this._dependencies.fetch
            })
        }

        if (!this._session.isOpen) {
            await this._session.open()
        }

        if (this._requester == null) {
            this._requester = new BardRequester(this._session)
        }

        return this._requester
    }

    private _createTranslation(language: string | null) {
        const translator =
            this._dependencies.translator ??
            createTranslator(
                {
                    language: language ?? '',
                    translatorApiKey: this._config.translatorApiKey
                },
                {
                    fetch: this._dependencies.fetch,
                    proxyAddress: this._proxyAddress,
                    timeout: this._config.timeout
                }
            )

        return new TranslationAdapter(translator, language)
    }

    private async _sendPrompt(
        text: string,
        options: AnswerOptions
    ): Promise<SessionResponse> {
        const requester = await this._ready()

        const prompt = await this._translation.outbound(text)

        const imageUrl =
            options.image != null
                ? await this._upload(
                      options.image,
                      options.imageName ?? 'Photo.jpg'
                  )
                : null

        const struct = buildAnswerRequest(prompt, this._conversation, {
            imageUrl,
            imageName: options.imageName,
            tool: options.tool
        })

        return requester.generate(struct, this._conversation.requestId)
    }

    private async _settle(
        response: SessionResponse,
        translation: TranslationAdapter
    ): Promise<BardAnswerResult> {
        let reader: PayloadReader

        try {
            reader = decodeStreamResponse(
                response.text,
                this._config.fallbackLineOffsets
            )
        } catch (e) {
            if (isBardKitError(e, BardKitErrorCode.UPSTREAM_EMPTY_RESPONSE)) {
                return {
                    content: e.originError?.message ?? e.message,
                    statusCode: response.status,
                    error: e
                }
            }

            throw e
        }

        return this._complete(reader, response.status, translation)
    }

    private async _complete(
        reader: PayloadReader,
        statusCode: number,
        translation: TranslationAdapter
    ): Promise<BardAnswer> {
        const choices = await translation.inbound(toChoices(reader))
        const answer = buildAnswer(reader, statusCode, choices)

        this._conversation.advance(answer)
        this._lastChoices = answer.choices

        await this._runCode(answer)

        return answer
    }

    private async _upload(image: Buffer, filename: string) {
        const uploader =
            this._dependencies.imageUploader ??
            new GoogleImageUploader(this._ensureSession())

        return uploader.upload(image, filename)
    }

    private _ensureSession(): BardSession {
        if (this._session == null) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error('The session has not been opened yet')
            )
        }

        return this._session
    }

    private async _runCode(answer: BardAnswer) {
        const runner = this._dependencies.codeRunner

        if (!this._config.runCode || runner == null || answer.code == null) {
            return
        }

        try {
            await runner.run(answer.code, answer.programLang)
        } catch (e) {
            logger.warn(`Running the answer's code failed: ${e}`)
        }
    }
}
