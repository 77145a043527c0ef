/**
 * @fileoverview Centralized error types and utilities for the inventory core.
 * Business outcomes and storage failures share one error class, told apart by code.
 */
import type { ZodError } from "zod";
import type { Logger } from "../logging/logger";

// ---------------------
// Error Types
// ---------------------

export type ErrorCode =
    | "VALIDATION_ERROR"
    | "NOT_FOUND"
    | "INSUFFICIENT_STOCK"
    | "MALFORMED_DATA"
    | "STORAGE_ERROR"
    | "INTERNAL_ERROR";

/** Codes that describe an expected business outcome rather than a failure of the system. */
export type BusinessErrorCode = Extract<ErrorCode, "VALIDATION_ERROR" | "NOT_FOUND" | "INSUFFICIENT_STOCK">;

const BUSINESS_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    "VALIDATION_ERROR",
    "NOT_FOUND",
    "INSUFFICIENT_STOCK",
]);

// ---------------------
// Custom Error Class
// ---------------------

/**
 * Application-specific error class with structured error information.
 */
export class AppError<C extends ErrorCode = ErrorCode> extends Error {
    public readonly code: C;
    public readonly details?: Record<string, unknown>;

    constructor(
        code: C,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        this.code = code;
        this.details = details;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, AppError);
        }
    }
}

export type BusinessError = AppError<BusinessErrorCode>;

// ---------------------
// Operation Results
// ---------------------

export interface OperationSuccess<T> {
    success: true;
    data: T;
}

export interface OperationFailure {
    success: false;
    error: BusinessError;
}

/** Outcome of an operation whose expected failures the caller must handle. */
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function ok<T>(data: T): OperationSuccess<T> {
    return { success: true, data };
}

export function fail(error: BusinessError): OperationFailure {
    return { success: false, error };
}

// ---------------------
// Error Factory Functions
// ---------------------

/**
 * Creates a validation error with field-specific details.
 */
export function validationError(
    message: string,
    fields?: Record<string, string[]>
): AppError<"VALIDATION_ERROR"> {
    return new AppError("VALIDATION_ERROR", message, fields ? { fields } : undefined);
}

export function notFoundError(resource = "Recurso"): AppError<"NOT_FOUND"> {
    return new AppError("NOT_FOUND", `${resource} no encontrado`);
}

export function insufficientStockError(
    productName: string,
    available: number,
    requested: number
): AppError<"INSUFFICIENT_STOCK"> {
    return new AppError(
        "INSUFFICIENT_STOCK",
        `Cantidad insuficiente para '${productName}'. Disponible: ${available}, solicitado: ${requested}`,
        { productName, available, requested }
    );
}

/**
 * Creates an error for a persisted file that cannot be read back.
 * `line` is the 1-based line of the offending row in the file.
 */
export function malformedDataError(path: string, message: string, line?: number): AppError<"MALFORMED_DATA"> {
    const location = line === undefined ? path : `${path}:${line}`;
    return new AppError("MALFORMED_DATA", `Datos inválidos en ${location}: ${message}`, {
        path,
        ...(line !== undefined && { line }),
    });
}

export function storageError(path: string, cause: unknown): AppError<"STORAGE_ERROR"> {
    return new AppError("STORAGE_ERROR", `No se pudo acceder a ${path}: ${getErrorMessage(cause)}`, {
        path,
        ...(isErrnoException(cause) && cause.code ? { errno: cause.code } : {}),
    });
}

/**
 * Converts a zod failure into a validation error keyed by field.
 */
export function fromZodError(error: ZodError, message = "Los datos proporcionados son inválidos"): AppError<"VALIDATION_ERROR"> {
    const fields: Record<string, string[]> = {};
    for (const issue of error.issues) {
        const key = issue.path.length > 0 ? issue.path.join(".") : "_root";
        (fields[key] ??= []).push(issue.message);
    }
    const first = error.issues[0]?.message;
    return validationError(first ? `${message}: ${first}` : message, fields);
}

// ---------------------
// Error Utilities
// ---------------------

export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}

export function isBusinessError(error: unknown): error is BusinessError {
    return isAppError(error) && BUSINESS_ERROR_CODES.has(error.code);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error;
}

/**
 * Extracts a user-friendly message from any error type.
 */
export function getErrorMessage(error: unknown, fallback = "Ha ocurrido un error"): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === "string") {
        return error;
    }
    return fallback;
}

/**
 * Logs an error with context for debugging.
 */
export function logError(
    logger: Logger,
    error: unknown,
    context?: { operation?: string; [key: string]: unknown }
): void {
    logger.error("operation failed", {
        ...(context && { context }),
        error: error instanceof Error
            ? {
                name: error.name,
                message: error.message,
                ...(isAppError(error) && { code: error.code, details: error.details }),
                ...(!isAppError(error) && { stack: error.stack }),
            }
            : { value: String(error) },
    });
}
