import { randomUUID } from 'crypto'
import type { Dict } from 'koishi'
import type { ConversationState } from './conversation'
import type { BardWebRequestInfo, TreeValue } from './types'
import { type RpcId, type Tool, TOOL_SELECTORS } from './utils'

export interface AnswerRequestOptions {
    imageUrl?: string | null
    imageName?: string
    tool?: Tool
}

export type ConversationIds = Pick<
    ConversationState,
    'conversationId' | 'responseId' | 'choiceId'
>

export function buildAnswerRequest(
    prompt: string,
    conversation: ConversationIds,
    options: AnswerRequestOptions = {}
): TreeValue[] {
    const images: TreeValue[] =
        options.imageUrl != null
            ? [[[options.imageUrl, 1], options.imageName ?? 'Photo.jpg']]
            : []

    const tools: TreeValue[] =
        options.tool != null ? [TOOL_SELECTORS[options.tool]] : []

    return [
        // input
        [prompt, 0, null, images, null, null, 0],
        null,
        // conversation
        [
            conversation.conversationId,
            conversation.responseId,
            conversation.choiceId
        ],
        null,
        null,
        null,
        [1],
        0,
        [],
        tools,
        1,
        0
    ]
}

export function buildImageQuestionRequest(
    prompt: string,
    imageUrl: string,
    language: string | null,
    conversation: ConversationIds
): TreeValue[] {
    return [
        [prompt, 0, null, [[[imageUrl, 1], 'uploaded_photo.jpg']]],
        // languages
        [language],
        [
            conversation.conversationId,
            conversation.responseId,
            conversation.choiceId
        ],
        // Unknown random string value (1000 characters +)
        '',
        // random uuid, 32 hex characters
        randomUUID().replace(/-/g, ''),
        null,
        [1],
        0,
        [],
        []
    ]
}

export function buildSpeechRequest(text: string, lang: string): TreeValue[] {
    return [null, text, lang, null, 2]
}

export function buildExportConversationRequest(
    conversationId: string,
    responseId: string,
    choiceId: string,
    title: string
): TreeValue[] {
    return [
        [
            null,
            [[[conversationId, responseId], null, null, [[], [], [], choiceId, []]]],
            [0, title]
        ]
    ]
}

export function buildExportReplitRequest(
    instructions: string,
    code: string,
    filename: string
): TreeValue[] {
    return [instructions, 5, code, [[filename, code]]]
}

/** `f.req` form of StreamGenerate: the request struct is JSON inside JSON. */
export function encodeStreamForm(
    struct: TreeValue[],
    at: string
): Dict<string> {
    return {
        'f.req': JSON.stringify([null, JSON.stringify(struct)]),
        at
    }
}

/** `f.req` form of batchexecute: one `[rpcId, args, null, 'generic']` per call. */
export function encodeBatchForm(
    rpcId: RpcId,
    args: TreeValue[],
    at: string
): Dict<string> {
    return {
        'f.req': JSON.stringify([[[rpcId, JSON.stringify(args), null, 'generic']]]),
        at
    }
}

export function buildStreamParams(
    info: BardWebRequestInfo,
    requestId: number
): Dict<string> {
    const params: Dict<string> = {
        bl: info.bl,
        _reqid: requestId.toString(),
        rt: 'c'
    }

    if (info.sid != null) {
        params['f.sid'] = info.sid
    }

    return params
}

export function buildBatchParams(
    info: BardWebRequestInfo,
    requestId: number,
    rpcId: RpcId,
    sourcePath: string = '/'
): Dict<string> {
    return {
        rpcids: rpcId,
        'source-path': sourcePath,
        ...buildStreamParams(info, requestId)
    }
}
