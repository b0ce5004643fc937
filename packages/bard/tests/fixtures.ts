import {
    type Fetcher,
    Headers,
    Response
} from '@bardkit/core/utils/request'
import { getPath } from '../src/payload'
import type { TreeValue } from '../src/types'

export interface RecordedRequest {
    url: URL
    method: string
    headers: Headers
    body: string | undefined
}

export type Handler = (request: RecordedRequest) => Response

/** An in-process stand-in for the transport; records every request it answers. */
export function createFakeFetch(handler: Handler) {
    const requests: RecordedRequest[] = []

    const fetch: Fetcher = async (info, init) => {
        const request: RecordedRequest = {
            url: new URL(String(info)),
            method: init?.method ?? 'GET',
            headers: new Headers(init?.headers),
            body: typeof init?.body === 'string' ? init.body : undefined
        }

        requests.push(request)

        return handler(request)
    }

    return { fetch, requests }
}

export const TEST_NONCE = 'test-nonce'

export const TEST_BUILD_LABEL = 'boq_assistant-bard-web-server_20240101.00_p0'

export const TEST_SESSION_ID = '-4242'

export function landingPage(
    fields: { nonce?: string; bl?: string; sid?: string } = {}
) {
    const data: Record<string, string> = {}

    if (fields.nonce !== '') data.SNlM0e = fields.nonce ?? TEST_NONCE
    if (fields.bl !== '') data.cfb2h = fields.bl ?? TEST_BUILD_LABEL
    if (fields.sid !== '') data.FdrFJe = fields.sid ?? TEST_SESSION_ID

    return `<!doctype html><html><script>window.WIZ_global_data = ${JSON.stringify(data)};</script></html>`
}

export interface ChoiceFixture {
    id: string
    text: string
    images?: string[]
}

export interface AnswerFixture {
    conversationId: string
    responseId: string
    textQuery?: string
    choices: ChoiceFixture[]
}

export function answerPayload(fixture: AnswerFixture): TreeValue {
    return [
        null,
        [fixture.conversationId, fixture.responseId],
        fixture.textQuery != null ? [fixture.textQuery, 1] : null,
        null,
        fixture.choices.map((choice) => [
            choice.id,
            [choice.text],
            null,
            null,
            (choice.images ?? []).map((url) => [[[url]], 'image'])
        ])
    ]
}

/** A StreamGenerate body: the XSSI guard, length prefixed chunks and a trailer. */
export function streamBody(payload: TreeValue | null) {
    const envelope = [
        ['wrb.fr', null, payload == null ? null : JSON.stringify(payload)]
    ]

    return [
        ")]}'",
        '',
        '1024',
        JSON.stringify(envelope),
        '25',
        '[["di",59],["af.httprm",58,"-1",1]]',
        ''
    ].join('\n')
}

export function batchBody(rpcId: string, payload: TreeValue) {
    const envelope = [
        ['wrb.fr', rpcId, JSON.stringify(payload), null, null, null, 'generic'],
        ['di', 40]
    ]

    return [")]}'", '', '512', JSON.stringify(envelope), ''].join('\n')
}

/** Decodes the request struct out of a StreamGenerate form body. */
export function readStreamStruct(body: string | undefined): TreeValue {
    const outer: TreeValue = JSON.parse(
        new URLSearchParams(body).get('f.req') ?? 'null'
    )
    const inner = getPath(outer, [1])

    if (typeof inner !== 'string') {
        throw new Error('not a StreamGenerate form')
    }

    const struct: TreeValue = JSON.parse(inner)

    return struct
}

/** Decodes `[rpcId, args]` out of a batchexecute form body. */
export function readBatchCall(body: string | undefined): [string, TreeValue] {
    const outer: TreeValue = JSON.parse(
        new URLSearchParams(body).get('f.req') ?? 'null'
    )

    const rpcId = getPath(outer, [0, 0, 0])
    const encoded = getPath(outer, [0, 0, 1])

    if (typeof rpcId !== 'string' || typeof encoded !== 'string') {
        throw new Error('not a batchexecute form')
    }

    const args: TreeValue = JSON.parse(encoded)

    return [rpcId, args]
}
