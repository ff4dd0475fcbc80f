import { AppError } from "../infra/errors.js";

/**
 * Errors that render as a JSON error body with their own HTTP status:
 * `{"error": {"code", "title", "message"}}`.
 */
export class ApiError extends AppError {
  constructor(
    statusCode: number,
    code: string,
    public readonly title: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, code, statusCode, cause);
    this.name = "ApiError";
  }

  toJSON(): { error: { code: string; title: string; message: string } } {
    return { error: { code: this.code, title: this.title, message: this.message } };
  }
}

/** A concrete error whose status, code, title and message are fixed. */
export type ApiErrorClass = new () => ApiError;

// Client input, rejected before anything reaches the validator

export class WrongBodyType extends ApiError {
  constructor() {
    super(
      400,
      "WRONG_BODY_TYPE",
      "Wrong Content Type",
      "Batches must be submitted as a BatchList protobuf, in the body of a request " +
        "with the 'application/octet-stream' content type.",
    );
    this.name = "WrongBodyType";
  }
}

export class EmptyProtobuf extends ApiError {
  constructor() {
    super(
      400,
      "EMPTY_PROTOBUF",
      "No Batches Submitted",
      "The protobuf BatchList you submitted was empty and contained no Batches.",
    );
    this.name = "EmptyProtobuf";
  }
}

export class BadProtobuf extends ApiError {
  constructor(cause?: unknown) {
    super(
      400,
      "BAD_PROTOBUF",
      "Protobuf Not Decodable",
      "The protobuf BatchList you submitted was malformed and could not be read.",
      cause,
    );
    this.name = "BadProtobuf";
  }
}

export class BadStatusBody extends ApiError {
  constructor(cause?: unknown) {
    super(
      400,
      "BAD_STATUS_BODY",
      "Bad Status Request",
      "Requests for batch statuses sent as a POST must have an 'application/json' " +
        "body holding a JSON array of batch id strings.",
      cause,
    );
    this.name = "BadStatusBody";
  }
}

export class MissingStatusId extends ApiError {
  constructor() {
    super(
      400,
      "MISSING_STATUS_ID",
      "Unable to Fetch Statuses",
      "Requests for batch statuses must specify at least one batch id.",
    );
    this.name = "MissingStatusId";
  }
}

export class PayloadTooLarge extends ApiError {
  constructor() {
    super(
      413,
      "PAYLOAD_TOO_LARGE",
      "Request Body Too Large",
      "The request body exceeds the size this gateway accepts.",
    );
    this.name = "PayloadTooLarge";
  }
}

export class RouteNotFound extends ApiError {
  constructor() {
    super(
      404,
      "ROUTE_NOT_FOUND",
      "Route Not Found",
      "There is no resource at the requested path.",
    );
    this.name = "RouteNotFound";
  }
}

export class MethodNotAllowed extends ApiError {
  constructor() {
    super(
      405,
      "METHOD_NOT_ALLOWED",
      "Method Not Allowed",
      "The requested resource does not support this HTTP method.",
    );
    this.name = "MethodNotAllowed";
  }
}

export class InvalidRequestUrl extends ApiError {
  constructor(cause?: unknown) {
    super(
      400,
      "INVALID_REQUEST_URL",
      "Invalid Request URL",
      "The request URL or Host header could not be parsed.",
      cause,
    );
    this.name = "InvalidRequestUrl";
  }
}

// Reported by the validator through a reply status

export class UnknownValidatorError extends ApiError {
  constructor() {
    super(
      500,
      "UNKNOWN_VALIDATOR_ERROR",
      "Unknown Validator Error",
      "An unknown error occurred with the validator while processing your request.",
    );
    this.name = "UnknownValidatorError";
  }
}

export class ValidatorNotReady extends ApiError {
  constructor() {
    super(
      503,
      "VALIDATOR_NOT_READY",
      "Validator Not Ready",
      "The validator has no genesis block, and is not yet ready to be queried.",
    );
    this.name = "ValidatorNotReady";
  }
}

export class HeadNotFound extends ApiError {
  constructor() {
    super(
      404,
      "HEAD_NOT_FOUND",
      "Head Not Found",
      "There is no block with the id specified as the 'head' of the chain.",
    );
    this.name = "HeadNotFound";
  }
}

export class SubmittedBatchesInvalid extends ApiError {
  constructor() {
    super(
      400,
      "SUBMITTED_BATCHES_INVALID",
      "Submitted Batches Invalid",
      "The submitted BatchList is invalid. It was poorly formed, or has an invalid signature.",
    );
    this.name = "SubmittedBatchesInvalid";
  }
}

export class StatusesNotReturned extends ApiError {
  constructor() {
    super(
      500,
      "STATUSES_NOT_RETURNED",
      "Unable to Fetch Statuses",
      "An unknown error occurred while attempting to fetch batch statuses.",
    );
    this.name = "StatusesNotReturned";
  }
}

export class LeafNotFound extends ApiError {
  constructor() {
    super(
      404,
      "LEAF_NOT_FOUND",
      "Leaf Not Found",
      "There is no leaf at the address specified in the state tree.",
    );
    this.name = "LeafNotFound";
  }
}

export class InvalidStateAddress extends ApiError {
  constructor() {
    super(
      400,
      "INVALID_STATE_ADDRESS",
      "Invalid State Address",
      "The state address requested is not a valid, 70-character hexadecimal address.",
    );
    this.name = "InvalidStateAddress";
  }
}

export class BlockNotFound extends ApiError {
  constructor() {
    super(
      404,
      "BLOCK_NOT_FOUND",
      "Block Not Found",
      "There is no block with the id specified in the blockchain.",
    );
    this.name = "BlockNotFound";
  }
}

export class InvalidBlockId extends ApiError {
  constructor() {
    super(
      400,
      "INVALID_BLOCK_ID",
      "Invalid Block Id",
      "The requested block id is not a valid, 128-character hexadecimal id.",
    );
    this.name = "InvalidBlockId";
  }
}

export class BatchNotFound extends ApiError {
  constructor() {
    super(
      404,
      "BATCH_NOT_FOUND",
      "Batch Not Found",
      "There is no batch with the id specified in the blockchain.",
    );
    this.name = "BatchNotFound";
  }
}

export class InvalidBatchId extends ApiError {
  constructor() {
    super(
      400,
      "INVALID_BATCH_ID",
      "Invalid Batch Id",
      "The requested batch id is not a valid, 128-character hexadecimal id.",
    );
    this.name = "InvalidBatchId";
  }
}

// Transport

export class ValidatorUnavailable extends ApiError {
  constructor(cause?: unknown) {
    super(
      503,
      "VALIDATOR_UNAVAILABLE",
      "Validator Unavailable",
      "The validator did not respond in time, or the connection to it was lost.",
      cause,
    );
    this.name = "ValidatorUnavailable";
  }
}

// Fallback for anything that is not an ApiError

export class InternalError extends ApiError {
  constructor() {
    super(
      500,
      "INTERNAL_ERROR",
      "Internal Error",
      "The gateway failed to process the validator's reply.",
    );
    this.name = "InternalError";
  }
}
