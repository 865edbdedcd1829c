import {
  BackendResult,
  NormalizedResponseBody,
} from './interfaces/gateway.interfaces';
import { isPlainObject } from '../../common/utils/is-plain-object';

export const INVALID_RESPONSE_FORMAT = 'Invalid response format from backend';
export const EMPTY_RESPONSE = 'Empty response from backend';

/**
 * Turn a resolved backend result into the client-facing body.
 * Never throws: anything unusable becomes an error-shaped mapping.
 */
export function normalizeResponse(result: BackendResult): NormalizedResponseBody {
  let mapping: unknown;

  switch (result.kind) {
    case 'structured':
      try {
        mapping = result.source.toMapping();
      } catch {
        return { error: INVALID_RESPONSE_FORMAT };
      }
      break;
    case 'field-bag':
      mapping = result.mapping;
      break;
    case 'unrecognized':
      return { error: INVALID_RESPONSE_FORMAT };
  }

  if (mapping === null || mapping === undefined) {
    return { error: EMPTY_RESPONSE };
  }
  if (!isPlainObject(mapping)) {
    return { error: INVALID_RESPONSE_FORMAT };
  }
  return mapping;
}
