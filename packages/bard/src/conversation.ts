import { Random } from 'koishi'
import type { BardAnswer, ConversationSnapshot } from './types'
import { REQUEST_ID_STEP } from './utils'

/** A random 4-digit seed for the `_reqid` query parameter. */
export function createRequestId() {
    return new Random().int(1000, 10000)
}

/**
 * Identifiers threading one conversation across requests.
 *
 * The ids sent with request N+1 are the ones decoded from answer N, unless the
 * caller selects another choice or resets. `requestId` only ever grows.
 */
export class ConversationState {
    private _conversationId: string

    private _responseId: string

    private _choiceId: string

    private _requestId: number

    constructor(seed: Partial<ConversationSnapshot> = {}) {
        this._conversationId = seed.conversationId ?? ''
        this._responseId = seed.responseId ?? ''
        this._choiceId = seed.choiceId ?? ''
        this._requestId = seed.requestId ?? createRequestId()
    }

    get conversationId() {
        return this._conversationId
    }

    get responseId() {
        return this._responseId
    }

    get choiceId() {
        return this._choiceId
    }

    get requestId() {
        return this._requestId
    }

    get isNew() {
        return this._conversationId === ''
    }

    /** Continue from the first choice of `answer` and bump the request id. */
    advance(
        answer: Pick<BardAnswer, 'conversationId' | 'responseId' | 'choices'>
    ) {
        this._conversationId = answer.conversationId
        this._responseId = answer.responseId
        this._choiceId = answer.choices[0]?.id ?? ''
        this.bump()
    }

    /** Branch the conversation from another candidate of the last answer. */
    selectChoice(choiceId: string) {
        this._choiceId = choiceId
    }

    bump() {
        this._requestId += REQUEST_ID_STEP
    }

    /** Starts a new conversation; the request id keeps counting. */
    reset() {
        this._conversationId = ''
        this._responseId = ''
        this._choiceId = ''
    }

    snapshot(): ConversationSnapshot {
        return {
            conversationId: this._conversationId,
            responseId: this._responseId,
            choiceId: this._choiceId,
            requestId: this._requestId
        }
    }

    restore(snapshot: ConversationSnapshot) {
        this._conversationId = snapshot.conversationId
        this._responseId = snapshot.responseId
        this._choiceId = snapshot.choiceId
        this._requestId = Math.max(this._requestId, snapshot.requestId)
    }
}
