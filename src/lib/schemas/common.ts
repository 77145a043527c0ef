/**
 * @fileoverview Common Zod schemas shared across the application.
 */
import { z } from "zod";

// ---------------------
// String Schemas
// ---------------------

/** Non-empty trimmed string */
export const requiredString = (fieldName = "Este campo") =>
    z.string().trim().min(1, `${fieldName} es requerido`);

// ---------------------
// Numeric Schemas
// ---------------------

/** Positive integer */
export const positiveIntSchema = z
    .number({ invalid_type_error: "Debe ser un número" })
    .int("Debe ser un número entero")
    .positive("Debe ser un número positivo");

/** Non-negative number (decimal allowed) */
export const nonNegativeNumberSchema = z
    .number({ invalid_type_error: "Debe ser un número" })
    .finite("Debe ser un número finito")
    .nonnegative("No puede ser negativo");

// ---------------------
// Text Input Schemas
// ---------------------

/** Integer typed as text, e.g. a command-line argument */
export const integerText = z
    .string()
    .trim()
    .regex(/^[-+]?\d+$/, "Debe ser un número entero")
    .transform((value) => Number(value));

/** Decimal typed as text; a decimal comma is accepted as well as a dot */
export const decimalText = z
    .string()
    .trim()
    .regex(/^[-+]?(\d+([.,]\d*)?|[.,]\d+)$/, "Debe ser un número decimal")
    .transform((value) => Number(value.replace(",", ".")));
