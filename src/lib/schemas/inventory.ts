/**
 * @fileoverview Zod schemas for inventory operations.
 * Names end up inside delimited files, so the rules depend on the storage settings.
 */
import { z } from "zod";
import type { StorageConfig } from "../env";
import {
    decimalText,
    integerText,
    nonNegativeNumberSchema,
    positiveIntSchema,
    requiredString,
} from "./common";

// ---------------------
// Name Schemas
// ---------------------

const LINE_BREAK = /[\r\n]/;

export function productNameSchema(delimiter: string) {
    return requiredString("El nombre del producto")
        .max(120, "El nombre del producto no puede exceder 120 caracteres")
        .refine((value) => !value.includes(delimiter), {
            message: `El nombre del producto no puede contener '${delimiter === "\t" ? "\\t" : delimiter}'`,
        })
        .refine((value) => !LINE_BREAK.test(value) && !value.includes('"'), {
            message: "El nombre del producto no puede contener comillas ni saltos de línea",
        });
}

/**
 * Warehouse names become file names: `<name>.<extension>` inside the data directory.
 * A trailing `.<extension>` is dropped.
 */
export function warehouseNameSchema(storage: Pick<StorageConfig, "extension" | "salesFileName">) {
    const suffix = `.${storage.extension}`;
    return requiredString("El nombre del almacén")
        .transform((value) => (value.toLowerCase().endsWith(suffix) ? value.slice(0, -suffix.length).trim() : value))
        .pipe(
            z
                .string()
                .min(1, "El nombre del almacén es requerido")
                .max(80, "El nombre del almacén no puede exceder 80 caracteres")
                .refine((value) => !/[/\\]/.test(value) && !LINE_BREAK.test(value), {
                    message: "El nombre del almacén no puede contener separadores de ruta",
                })
                .refine((value) => value !== "." && value !== "..", {
                    message: "Nombre de almacén inválido",
                })
                .refine((value) => value.toLowerCase() !== storage.salesFileName.toLowerCase(), {
                    message: `'${storage.salesFileName}' está reservado para el registro de ventas`,
                })
        );
}

// ---------------------
// Operation Schemas
// ---------------------

export function buildInventorySchemas(storage: Pick<StorageConfig, "extension" | "salesFileName" | "delimiter">) {
    const warehouseName = warehouseNameSchema(storage);
    const productName = productNameSchema(storage.delimiter);

    const addProduct = z.object({
        warehouseName,
        name: productName,
        quantity: positiveIntSchema,
        purchasePrice: nonNegativeNumberSchema,
        salePrice: nonNegativeNumberSchema,
    });

    const sellProduct = z.object({
        warehouseName,
        name: productName,
        quantity: positiveIntSchema,
    });

    const productLookup = z.object({
        warehouseName,
        name: productName,
    });

    return { warehouseName, productName, addProduct, sellProduct, productLookup };
}

export type InventorySchemas = ReturnType<typeof buildInventorySchemas>;

// ---------------------
// Command-line Arguments
// ---------------------

/** Positional arguments of `add`, still as text. */
export const addArgumentsSchema = z.object({
    warehouseName: z.string(),
    name: z.string(),
    quantity: integerText,
    purchasePrice: decimalText,
    salePrice: decimalText,
});

/** Positional arguments of `sell`, still as text. */
export const sellArgumentsSchema = z.object({
    warehouseName: z.string(),
    name: z.string(),
    quantity: integerText,
});
