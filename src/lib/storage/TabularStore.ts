/**
 * Reads and writes lists of records as delimited text files with a header row.
 * Holds no data between calls: every load goes back to disk.
 */
import { access, mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import Papa from "papaparse";
import { isErrnoException, malformedDataError, storageError } from "../errors";
import type { TableDefinition } from "./tables";

export interface TabularStoreOptions {
  delimiter: string;
}

const isBlankRow = (row: string[]) => row.length === 1 && row[0].trim().length === 0;

export class TabularStore {
  private readonly delimiter: string;

  constructor(options: TabularStoreOptions = { delimiter: "," }) {
    this.delimiter = options.delimiter;
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return false;
      }
      throw storageError(filePath, error);
    }
  }

  /**
   * Loads every record of `filePath`. A missing or empty file yields no records.
   * Throws MALFORMED_DATA on a header mismatch or on the first row that does not fit `table`.
   */
  async load<T>(filePath: string, table: TableDefinition<T>): Promise<T[]> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw storageError(filePath, error);
    }

    const cleaned = text.replace(/^\uFEFF/, "");
    if (cleaned.trim().length === 0) {
      return [];
    }

    const parsed = Papa.parse<string[]>(cleaned, {
      delimiter: this.delimiter,
      skipEmptyLines: false,
    });

    const parseError = parsed.errors[0];
    if (parseError) {
      const line = typeof parseError.row === "number" ? parseError.row + 1 : undefined;
      throw malformedDataError(filePath, parseError.message, line);
    }

    // Row index + 1 is the line number as long as no quoted field spans lines.
    const rows = parsed.data.map((fields, index) => ({ fields, line: index + 1 })).filter((row) => !isBlankRow(row.fields));

    const [headerRow, ...dataRows] = rows;
    if (!headerRow) {
      return [];
    }

    const header = headerRow.fields.map((field) => field.trim());
    this.assertHeader(filePath, header, table, headerRow.line);

    return dataRows.map(({ fields, line }) => {
      if (fields.length !== header.length) {
        throw malformedDataError(
          filePath,
          `se esperaban ${header.length} campos y hay ${fields.length}`,
          line
        );
      }

      const raw: Record<string, string> = {};
      table.optionalColumns?.forEach((column) => {
        raw[column] = "";
      });
      header.forEach((column, index) => {
        raw[column] = fields[index];
      });

      const result = table.rowSchema.safeParse(raw);
      if (!result.success) {
        const issue = result.error.issues[0];
        const column = issue?.path[0];
        const detail = issue?.message ?? "fila inválida";
        throw malformedDataError(
          filePath,
          typeof column === "string" ? `columna '${column}': ${detail}` : detail,
          line
        );
      }
      return result.data;
    });
  }

  /**
   * Rewrites `filePath` with the header and all records. The content goes to a
   * sibling temp file first and is then renamed over the target.
   */
  async save<T>(filePath: string, table: TableDefinition<T>, records: readonly T[]): Promise<void> {
    const content = Papa.unparse(
      {
        fields: [...table.columns],
        data: records.map((record) => table.toRow(record)),
      },
      { delimiter: this.delimiter, newline: "\n" }
    );

    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, `${content}\n`, "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch(() => {});
      throw storageError(filePath, error);
    }
  }

  private assertHeader<T>(filePath: string, header: string[], table: TableDefinition<T>, line: number): void {
    const found = new Set(header);
    const optional = new Set(table.optionalColumns ?? []);
    const matches =
      found.size === header.length &&
      header.every((column) => table.columns.includes(column)) &&
      table.columns.every((column) => found.has(column) || optional.has(column));

    if (!matches) {
      throw malformedDataError(
        filePath,
        `encabezado de ${table.name} inesperado: se esperaba "${table.columns.join(this.delimiter)}" y se encontró "${header.join(this.delimiter)}"`,
        line
      );
    }
  }
}
