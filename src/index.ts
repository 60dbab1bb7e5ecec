/**
 * EIOPA リスクフリーレート クライアント
 */

export {
  EiopaClient,
  createEiopaClient,
  getDefaultClient,
  resetDefaultClient,
  getOptions,
  getRfr,
  getRfrWithVa,
  getRfrNoVa,
  type EiopaClientOptions,
} from './lib/eiopa/client';
export { buildOptionsPath, buildRfrPath, DEFAULT_BASE_URL } from './lib/eiopa/paths';
export { toFilter, serializeFilter, normalizeFilter } from './lib/eiopa/filters';
export {
  shapeRfr,
  formatRfr,
  getRate,
  getRow,
  emptyRfr,
  UNKNOWN_CURVE_ID,
  type ShapeOptions,
} from './lib/eiopa/shape';
export { parseCurvePayload, parseOptionsPayload } from './lib/eiopa/schemas';
export { CURVE_KINDS } from './lib/eiopa/types';
export type {
  CurveKind,
  CurveRecord,
  EiopaRfr,
  Filter,
  FilterInput,
  JsonValue,
  MetadataCell,
  MetadataTable,
  MetadataValue,
  OptionValue,
  RateCell,
  RateTable,
} from './lib/eiopa/types';
export {
  EiopaError,
  InvalidArgumentError,
  MalformedPayloadError,
  RemoteRejectedError,
  RemoteUnreachableError,
} from './lib/utils/errors';
export { getJson, DEFAULT_TIMEOUT_MS, type GetJsonOptions } from './lib/utils/http';
export { createLogger, type Logger, type LogContext, type LogLevel } from './lib/utils/logger';
