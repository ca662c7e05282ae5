export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export { NotFoundError, ValidationError, ExternalServiceError } from "./errors.js";
