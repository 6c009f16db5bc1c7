/**
 * @fileoverview Batch processing
 *
 * Splits a decoded body into independent dispatches and recombines their
 * responses in request order.
 */

import { errorResponse } from './envelope.js';
import { InvalidRequestError, shapeError } from './errors.js';
import type { DispatchOutcome } from './dispatcher.js';
import type { RpcPayload, RpcResponse } from './types.js';

/**
 * Dispatch one element. `index` is the element's position in a batch,
 * undefined for a single request.
 */
export type DispatchFn = (candidate: unknown, index: number | undefined) => Promise<DispatchOutcome>;

export interface BatchOptions {
  /** Largest accepted batch; 0 or absent means unlimited */
  maxBatchSize?: number;
}

export const EMPTY_BATCH_REASON = 'batch must not be empty';
export const NOT_A_REQUEST_REASON = 'body must be a request object or an array of requests';

function invalid(reason: string): RpcResponse {
  return errorResponse(null, shapeError(new InvalidRequestError(reason)));
}

/**
 * A body the transport may treat as malformed: valid JSON, but neither an
 * object nor an array.
 */
export function isStructuredBody(value: unknown): boolean {
  return typeof value === 'object' && value !== null;
}

/**
 * Process a decoded body.
 *
 * @returns The response payload, or null when nothing is to be sent back
 * (a notification, or a batch made only of notifications)
 */
export async function processPayload(
  value: unknown,
  dispatch: DispatchFn,
  options: BatchOptions = {}
): Promise<RpcPayload | null> {
  if (!isStructuredBody(value)) {
    return invalid(NOT_A_REQUEST_REASON);
  }

  if (!Array.isArray(value)) {
    const outcome = await dispatch(value, undefined);
    return outcome.state === 'responded' ? outcome.response : null;
  }

  if (value.length === 0) {
    return invalid(EMPTY_BATCH_REASON);
  }

  const { maxBatchSize } = options;
  if (maxBatchSize !== undefined && maxBatchSize > 0 && value.length > maxBatchSize) {
    return invalid(`batch exceeds the maximum of ${maxBatchSize} requests`);
  }

  // Promise.all keeps input order regardless of completion order
  const elements: unknown[] = value;
  const outcomes = await Promise.all(elements.map((element, index) => dispatch(element, index)));

  const responses: RpcResponse[] = [];
  for (const outcome of outcomes) {
    if (outcome.state === 'responded') {
      responses.push(outcome.response);
    }
  }

  return responses.length > 0 ? responses : null;
}
