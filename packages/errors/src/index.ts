export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export { errorChain, formatErrorChain, messageOf } from "./core/utils/error-chain"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
