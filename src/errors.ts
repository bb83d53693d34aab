// Error taxonomy for history queries and report rendering

export type HistoryErrorCode =
  | "INVALID_RANGE"
  | "DECODE_ERROR"
  | "FIELD_PARSE_ERROR"
  | "PROBE_FAILURE"
  | "MISSING_PATH"
  | "STORE_NOT_FOUND"

export class HistoryError extends Error {
  readonly code: HistoryErrorCode
  constructor(code: HistoryErrorCode, message: string) {
    super(message)
    this.name = "HistoryError"
    this.code = code
  }
}

export class InvalidRangeError extends HistoryError {
  constructor(message: string) {
    super("INVALID_RANGE", message)
    this.name = "InvalidRangeError"
  }
}

export class DecodeError extends HistoryError {
  readonly key: number
  constructor(key: number, reason: string) {
    super("DECODE_ERROR", `record ${key} could not be decoded: ${reason}`)
    this.name = "DecodeError"
    this.key = key
  }
}

/**
 * Failure to parse one schema field. Never thrown: it travels as the payload
 * of an invalid parse outcome and is logged by the tree builder.
 */
export class FieldParseError extends HistoryError {
  readonly field: string
  readonly schema: string
  readonly reason: string
  constructor(field: string, schema: string, reason: string) {
    super("FIELD_PARSE_ERROR", `${schema}.${field}: ${reason}`)
    this.name = "FieldParseError"
    this.field = field
    this.schema = schema
    this.reason = reason
  }
}

export class ProbeFailureError extends HistoryError {
  readonly probe: string
  constructor(probe: string, reason: string) {
    super("PROBE_FAILURE", `${probe} failed: ${reason}`)
    this.name = "ProbeFailureError"
    this.probe = probe
  }
}

export class MissingPathError extends HistoryError {
  readonly path: string
  constructor(path: string, segment: string) {
    super("MISSING_PATH", `field path "${path}" not found (missing "${segment}")`)
    this.name = "MissingPathError"
    this.path = path
  }
}

export class StoreNotFoundError extends HistoryError {
  readonly node: string
  constructor(node: string) {
    super("STORE_NOT_FOUND", `no history store for node "${node}"`)
    this.name = "StoreNotFoundError"
    this.node = node
  }
}
