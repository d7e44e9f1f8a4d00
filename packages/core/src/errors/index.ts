/**
 * @fileoverview Error barrel exports
 *
 * @module @confrest/core/errors
 */

export { ERROR_CODES, type ErrorCode } from "./codes.js";
export {
    ConfRestError,
    ClientError,
    ConfigError,
    isConfRestError,
} from "./ConfRestError.js";
export {
    MissingIdentifiersError,
    NoConfigPathError,
    InvalidRefError,
    MissingArgumentError,
    ObjectNotFoundError,
    FieldNotFoundError,
    IdNotFoundError,
    IdParseError,
    NotAnArrayError,
    TypeParseError,
    RowCountMismatchError,
    DuplicateKeyError,
    UnauthorizedError,
    ResourceNotFoundError,
    BadRequestError,
    InternalServerError,
    UndefinedHttpError,
    HttpError,
} from "./ClientErrors.js";
export {
    RequiredFieldEmptyError,
    DoesNotMatchRegexError,
    StringTooShortError,
    StringTooLongError,
    StringTooLongWhenPercentEncodedError,
    InvalidUtf8Error,
    InvalidQuorumError,
    InvalidIpError,
} from "./ConfigErrors.js";
