import { z } from "zod";

const truthy = new Set(["1", "true", "yes", "on"]);
const falsy = new Set(["0", "false", "no", "off"]);

const parseBooleanFlag = (input: string | undefined, defaultValue: boolean) => {
  if (typeof input !== "string" || input.trim().length === 0) {
    return defaultValue;
  }
  const normalized = input.trim().toLowerCase();
  if (truthy.has(normalized)) {
    return true;
  }
  if (falsy.has(normalized)) {
    return false;
  }
  return defaultValue;
};

const resolveDelimiter = (input: string) => (input === "\\t" || input.toLowerCase() === "tab" ? "\t" : input);

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z
  .object({
    STOCK_DATA_DIR: z.string().trim().min(1, "STOCK_DATA_DIR no puede estar vacío").default("data"),
    SALES_FILE_NAME: z
      .string()
      .trim()
      .regex(/^[^/\\]+$/, "SALES_FILE_NAME no puede contener separadores de ruta")
      .default("sales"),
    TABLE_FILE_EXTENSION: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9]+$/, "TABLE_FILE_EXTENSION debe ser alfanumérica")
      .default("csv"),
    TABLE_DELIMITER: z
      .string()
      .default(",")
      .transform(resolveDelimiter)
      .refine((value) => [",", ";", "\t", "|"].includes(value), {
        message: "TABLE_DELIMITER debe ser ',', ';', '|' o tab",
      }),
    CURRENCY_SYMBOL: z.string().trim().min(1).default("€"),
    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .default("info")
      .pipe(z.enum(LOG_LEVELS)),
    LOG_DIR: z.string().trim().optional(),
    MOCK_DATA: z.string().trim().optional(),
  })
  .transform((value) => {
    const useMockData = parseBooleanFlag(value.MOCK_DATA, false);
    const extension = value.TABLE_FILE_EXTENSION.toLowerCase();
    const salesFileName = value.SALES_FILE_NAME.toLowerCase().endsWith(`.${extension}`)
      ? value.SALES_FILE_NAME.slice(0, -(extension.length + 1))
      : value.SALES_FILE_NAME;

    return {
      useMockData,
      storage: {
        dataDir: value.STOCK_DATA_DIR,
        salesFileName,
        extension,
        delimiter: value.TABLE_DELIMITER,
      },
      currency: {
        symbol: value.CURRENCY_SYMBOL,
      },
      logLevel: value.LOG_LEVEL,
      logDir: value.LOG_DIR ? value.LOG_DIR : null,
    };
  });

export type AppConfig = z.output<typeof envSchema>;

export type StorageConfig = AppConfig["storage"];

export type EnvParseResult =
  | { success: true; data: AppConfig }
  | { success: false; fieldErrors: Record<string, string[]> };

/**
 * Validates a set of environment variables into the application config.
 * Unset variables fall back to their defaults.
 */
export function parseEnv(source: Record<string, string | undefined>): EnvParseResult {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (messages && messages.length > 0) {
        fieldErrors[field] = messages;
      }
    }
    return { success: false, fieldErrors };
  }
  return { success: true, data: parsed.data };
}

export function loadEnv(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = parseEnv(source);
  if (!parsed.success) {
    console.error("Error al validar variables de entorno", parsed.fieldErrors);
    throw new Error("Variables de entorno inválidas. Revisa el archivo .env");
  }
  return parsed.data;
}
