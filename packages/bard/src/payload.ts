import type { TreeValue } from './types'

export type FieldPath = readonly number[]

/**
 * Positions of the fields inside the decoded answer payload.
 * Format drift only needs a new schema here.
 */
export interface PayloadSchema {
    answer: {
        conversationId: FieldPath
        responseId: FieldPath
        textQuery: FieldPath
        factualityQueries: FieldPath
        candidates: FieldPath
    }
    candidate: {
        id: FieldPath
        content: FieldPath
        text: FieldPath
        images: FieldPath
    }
    image: {
        url: FieldPath
    }
    envelope: {
        marker: FieldPath
        rpcId: FieldPath
        payload: FieldPath
    }
}

export const PAYLOAD_SCHEMA_V1: PayloadSchema = {
    answer: {
        conversationId: [1, 0],
        responseId: [1, 1],
        textQuery: [2, 0],
        factualityQueries: [3],
        candidates: [4]
    },
    candidate: {
        id: [0],
        content: [1],
        text: [1, 0],
        images: [4]
    },
    image: {
        url: [0, 0, 0]
    },
    envelope: {
        marker: [0],
        rpcId: [1],
        payload: [2]
    }
}

export function getPath(
    tree: TreeValue | undefined,
    path: FieldPath
): TreeValue | undefined {
    let current = tree

    for (const index of path) {
        if (!Array.isArray(current)) {
            return undefined
        }
        current = current[index]
    }

    return current
}

export function asString(value: TreeValue | undefined): string | undefined {
    return typeof value === 'string' ? value : undefined
}

export function asArray(value: TreeValue | undefined): TreeValue[] | undefined {
    return Array.isArray(value) ? value : undefined
}

/** Named accessors over one candidate entry of the payload. */
export class CandidateReader {
    constructor(
        private _tree: TreeValue | undefined,
        private _schema: PayloadSchema = PAYLOAD_SCHEMA_V1
    ) {}

    get id() {
        return asString(getPath(this._tree, this._schema.candidate.id))
    }

    get content() {
        return asArray(getPath(this._tree, this._schema.candidate.content))
    }

    get text() {
        return asString(getPath(this._tree, this._schema.candidate.text))
    }

    get imageUrls(): string[] {
        const images = asArray(
            getPath(this._tree, this._schema.candidate.images)
        )

        if (images == null) {
            return []
        }

        const urls: string[] = []

        for (const image of images) {
            const url = asString(getPath(image, this._schema.image.url))
            if (url != null) {
                urls.push(url)
            }
        }

        return urls
    }
}

/** Named accessors over a decoded answer payload. */
export class PayloadReader {
    constructor(
        public readonly tree: TreeValue,
        private _schema: PayloadSchema = PAYLOAD_SCHEMA_V1
    ) {}

    get conversationId() {
        return asString(getPath(this.tree, this._schema.answer.conversationId))
    }

    get responseId() {
        return asString(getPath(this.tree, this._schema.answer.responseId))
    }

    get textQuery() {
        return asString(getPath(this.tree, this._schema.answer.textQuery))
    }

    get factualityQueries(): TreeValue {
        return getPath(this.tree, this._schema.answer.factualityQueries) ?? null
    }

    get rawCandidates() {
        return asArray(getPath(this.tree, this._schema.answer.candidates))
    }

    get candidates(): CandidateReader[] {
        return (this.rawCandidates ?? []).map(
            (candidate) => new CandidateReader(candidate, this._schema)
        )
    }

    get hasCandidates() {
        const candidates = this.rawCandidates
        return candidates != null && candidates.length > 0
    }
}

/** One `wrb.fr` entry of an envelope line. */
export interface EnvelopeEntry {
    rpcId: string | null
    payload: string | null
}

export const ENVELOPE_MARKER = 'wrb.fr'

export function readEnvelopeEntry(
    item: TreeValue,
    schema: PayloadSchema = PAYLOAD_SCHEMA_V1
): EnvelopeEntry | null {
    if (getPath(item, schema.envelope.marker) !== ENVELOPE_MARKER) {
        return null
    }

    return {
        rpcId: asString(getPath(item, schema.envelope.rpcId)) ?? null,
        payload: asString(getPath(item, schema.envelope.payload)) ?? null
    }
}
