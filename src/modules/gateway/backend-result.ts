import {
  BackendResult,
  MappingConvertible,
} from './interfaces/gateway.interfaces';
import { isPlainObject } from '../../common/utils/is-plain-object';

/**
 * Chat completion returned by the HTTP backend. Exposes the decoded JSON
 * document through the mapping capability.
 */
export class BackendCompletion implements MappingConvertible {
  constructor(private readonly document: Record<string, unknown>) { }

  toMapping(): Record<string, unknown> {
    return this.document;
  }
}

function isMappingConvertible(value: unknown): value is MappingConvertible {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toMapping' in value &&
    typeof value.toMapping === 'function'
  );
}

/**
 * Resolve a raw backend value into the shape the response normalizer works on
 */
export function resolveBackendResult(value: unknown): BackendResult {
  if (isMappingConvertible(value)) {
    return { kind: 'structured', source: value };
  }
  if (isPlainObject(value)) {
    return { kind: 'field-bag', mapping: value };
  }
  return { kind: 'unrecognized', value };
}
