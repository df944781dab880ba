/**
 * Sheet column mapping.
 *
 * Indices are 0-based (column A is 0). A field left out of the mapping is
 * reported as "N/A" for every row.
 */

import * as fs from "fs";
import { z } from "zod";

const columnIndex = z.number().int().nonnegative();

const studentColumnsSchema = z.object({
  name: columnIndex,
  gender: columnIndex.optional(),
  age: columnIndex.optional(),
});

export const columnMappingSchema = z.object({
  timestamp: columnIndex.optional(),
  email: columnIndex.optional(),
  municipality: columnIndex.optional(),
  schoolLevel: columnIndex.optional(),
  schoolName: columnIndex.optional(),
  discipline: columnIndex.optional(),
  topic: columnIndex.optional(),
  documents: columnIndex.optional(),
  students: z.array(studentColumnsSchema).default([]),
});

export type StudentColumns = z.infer<typeof studentColumnsSchema>;
export type ColumnMapping = z.infer<typeof columnMappingSchema>;

/**
 * Layout of the registration form responses sheet.
 */
export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  timestamp: 0,
  email: 1,
  municipality: 2,
  schoolLevel: 3,
  schoolName: 4,
  discipline: 5,
  topic: 6,
  students: [
    { name: 7, gender: 8, age: 9 },
    { name: 14, gender: 15, age: 16 },
    { name: 21, gender: 22, age: 23 },
  ],
  documents: 28,
};

/**
 * Validates a parsed mapping object.
 *
 * @throws Error listing every invalid field
 */
export function parseColumnMapping(raw: unknown): ColumnMapping {
  const result = columnMappingSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid column mapping: ${issues}`);
  }
  return result.data;
}

/**
 * Reads a mapping from a JSON file, or returns the default mapping when no
 * path is given.
 */
export function loadColumnMapping(filePath: string): ColumnMapping {
  if (!filePath) {
    return DEFAULT_COLUMN_MAPPING;
  }

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read column mapping ${filePath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error(`Column mapping ${filePath} is not valid JSON`);
  }

  return parseColumnMapping(raw);
}
