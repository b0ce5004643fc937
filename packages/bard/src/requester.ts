import { BardKitError, BardKitErrorCode } from '@bardkit/core/utils/error'
import { createLogger } from '@bardkit/core/utils/logger'
import { decodeBatchResponse } from './decoder'
import {
    buildBatchParams,
    buildStreamParams,
    encodeBatchForm,
    encodeStreamForm
} from './encoder'
import type { BardSession, SessionResponse } from './session'
import type { TreeValue } from './types'
import { BATCH_EXECUTE_URL, type RpcId, STREAM_GENERATE_URL } from './utils'

const logger = createLogger('bard/requester')

export interface BatchResult {
    status: number
    payload: TreeValue
}

/** Posts encoded requests to the two front-end endpoints. */
export class BardRequester {
    constructor(private _session: BardSession) {}

    /**
     * POSTs one StreamGenerate exchange and returns the raw body.
     * Decoding is left to the caller, which decides how an empty body is reported.
     */
    async generate(
        struct: TreeValue[],
        requestId: number
    ): Promise<SessionResponse> {
        const info = this._session.webRequestInfo

        const response = await this._session.post(STREAM_GENERATE_URL, {
            params: buildStreamParams(info, requestId),
            form: encodeStreamForm(struct, info.at)
        })

        logger.debug(`StreamGenerate response: ${response.text}`)

        return response
    }

    async execute(
        rpcId: RpcId,
        args: TreeValue[],
        requestId: number,
        sourcePath: string = '/'
    ): Promise<BatchResult> {
        const info = this._session.webRequestInfo

        const response = await this._session.post(BATCH_EXECUTE_URL, {
            params: buildBatchParams(info, requestId, rpcId, sourcePath),
            form: encodeBatchForm(rpcId, args, info.at)
        })

        logger.debug(`batchexecute ${rpcId} response: ${response.text}`)

        if (!response.ok) {
            throw new BardKitError(
                BardKitErrorCode.API_REQUEST_FAILED,
                new Error(
                    `batchexecute ${rpcId} returned status ${response.status}`
                )
            )
        }

        return {
            status: response.status,
            payload: decodeBatchResponse(response.text, rpcId)
        }
    }
}
