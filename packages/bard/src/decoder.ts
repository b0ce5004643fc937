import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import {
    type EnvelopeEntry,
    PAYLOAD_SCHEMA_V1,
    PayloadReader,
    type PayloadSchema,
    readEnvelopeEntry
} from './payload'
import type { BardAnswer, BardChoice, TreeValue } from './types'

const logger = createLogger('bard/decoder')

const ENVELOPE_LINE_PREFIX = '[["wrb.fr'

export class UpstreamEmptyResponse extends Error {
    constructor(public readonly body: string) {
        super(
            'Response Error: unable to get response. Please double-check the cookie values and verify your network environment or google account.'
        )
        this.name = 'UpstreamEmptyResponse'
    }
}

export function emptyResponseError(body: string) {
    return new BardKitError(
        BardKitErrorCode.UPSTREAM_EMPTY_RESPONSE,
        new UpstreamEmptyResponse(body)
    )
}

/** Splits like a line reader: no trailing empty line, `\r\n` tolerated. */
export function splitLines(body: string): string[] {
    const lines = body.split(/\r?\n/)

    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop()
    }

    return lines
}

export function parseTree(text: string): TreeValue | undefined {
    try {
        const value: TreeValue = JSON.parse(text)
        return value
    } catch {
        return undefined
    }
}

export function parseEnvelopeLine(
    line: string,
    schema: PayloadSchema = PAYLOAD_SCHEMA_V1
): EnvelopeEntry[] {
    const parsed = parseTree(line.trim())

    if (!Array.isArray(parsed)) {
        return []
    }

    const entries: EnvelopeEntry[] = []

    for (const item of parsed) {
        const entry = readEnvelopeEntry(item, schema)
        if (entry != null) {
            entries.push(entry)
        }
    }

    return entries
}

/**
 * Finds the answer payload inside a StreamGenerate body.
 *
 * Lines starting with the `wrb.fr` marker are tried from the last one
 * backwards, then the fixed `fallbackLineOffsets` (negative values count from
 * the end). A line whose payload slot is null, or whose payload has no
 * candidates (an early heartbeat), is skipped.
 */
export function decodeStreamResponse(
    body: string,
    fallbackLineOffsets: readonly number[] = [-5, -7],
    schema: PayloadSchema = PAYLOAD_SCHEMA_V1
): PayloadReader {
    const lines = splitLines(body)

    for (const index of candidateLineIndexes(lines, fallbackLineOffsets)) {
        for (const entry of parseEnvelopeLine(lines[index], schema)) {
            if (entry.payload == null || entry.payload.length === 0) {
                continue
            }

            const tree = parseTree(entry.payload)

            if (tree == null) {
                continue
            }

            const reader = new PayloadReader(tree, schema)

            if (reader.hasCandidates) {
                return reader
            }
        }

        logger.debug(`line ${index} carried no payload, trying the next one`)
    }

    throw emptyResponseError(body)
}

function candidateLineIndexes(
    lines: string[],
    fallbackLineOffsets: readonly number[]
): number[] {
    const indexes: number[] = []

    for (let i = lines.length - 1; i >= 0; i--) {
        if (lines[i].trimStart().startsWith(ENVELOPE_LINE_PREFIX)) {
            indexes.push(i)
        }
    }

    for (const offset of fallbackLineOffsets) {
        const index = offset < 0 ? lines.length + offset : offset

        if (index >= 0 && index < lines.length && !indexes.includes(index)) {
            indexes.push(index)
        }
    }

    return indexes
}

/**
 * Decodes the payload of one RPC in a batchexecute body.
 * Falls back to the first entry carrying a payload when no entry names `rpcId`.
 */
export function decodeBatchResponse(
    body: string,
    rpcId: string,
    schema: PayloadSchema = PAYLOAD_SCHEMA_V1
): TreeValue {
    const entries = splitLines(body).flatMap((line) =>
        parseEnvelopeLine(line, schema)
    )

    const entry =
        entries.find((e) => e.rpcId === rpcId && e.payload != null) ??
        entries.find((e) => e.payload != null)

    const tree = entry?.payload != null ? parseTree(entry.payload) : undefined

    if (tree == null) {
        throw emptyResponseError(body)
    }

    return tree
}

export interface ExtractedCode {
    programLang: string | null
    code: string | null
}

/**
 * Reads the first fenced code block of `content`.
 * The language is what follows the opening fence up to the newline.
 */
export function extractCode(content: string): ExtractedCode {
    const open = content.indexOf('```')

    if (open === -1) {
        return { programLang: null, code: null }
    }

    const close = content.indexOf('```', open + 3)
    const block = content.slice(open + 3, close === -1 ? undefined : close)
    const newline = block.indexOf('\n')

    if (newline === -1) {
        return { programLang: block.trim(), code: '' }
    }

    return {
        programLang: block.slice(0, newline).trim(),
        code: block.slice(newline + 1)
    }
}

/** Every absolute http(s) URL in the tree, favicons excluded. */
export function extractLinks(data: TreeValue | undefined): string[] {
    const links: string[] = []

    if (Array.isArray(data)) {
        for (const item of data) {
            collectLinks(item, links)
        }
    }

    return links
}

function collectLinks(item: TreeValue, links: string[]) {
    if (typeof item === 'string') {
        if (/^https?:\/\//.test(item) && !item.includes('favicon')) {
            links.push(item)
        }
    } else if (Array.isArray(item)) {
        links.push(...extractLinks(item))
    } else if (item != null && typeof item === 'object') {
        links.push(...extractLinks(Object.values(item)))
    }
}

export function extractImages(reader: PayloadReader): string[] {
    return reader.candidates[0]?.imageUrls ?? []
}

export function toChoices(reader: PayloadReader): BardChoice[] {
    const choices: BardChoice[] = []

    for (const candidate of reader.candidates) {
        const id = candidate.id

        if (id == null) {
            continue
        }

        choices.push({ id, content: candidate.content ?? [] })
    }

    return choices
}

/**
 * Assembles the answer. `choices` may differ from the payload's own
 * candidates, for example after translation.
 */
export function buildAnswer(
    reader: PayloadReader,
    statusCode: number,
    choices: BardChoice[] = toChoices(reader)
): BardAnswer {
    const conversationId = reader.conversationId
    const responseId = reader.responseId

    if (conversationId == null || responseId == null || choices.length < 1) {
        throw new BardKitError(
            BardKitErrorCode.RESPONSE_PARSE_ERROR,
            new Error(
                'The payload has no conversation id, response id or candidate'
            )
        )
    }

    const first = choices[0].content[0]
    const content = typeof first === 'string' ? first : ''

    return {
        content,
        conversationId,
        responseId,
        factualityQueries: reader.factualityQueries,
        textQuery: reader.textQuery ?? '',
        choices,
        links: extractLinks(reader.rawCandidates),
        images: extractImages(reader),
        ...extractCode(content),
        statusCode
    }
}
