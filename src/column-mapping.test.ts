import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  DEFAULT_COLUMN_MAPPING,
  loadColumnMapping,
  parseColumnMapping,
} from "./column-mapping";

describe("parseColumnMapping", () => {
  it("accepts a partial mapping and defaults students to none", () => {
    expect(parseColumnMapping({ municipality: 2 })).toEqual({
      municipality: 2,
      students: [],
    });
  });

  it("lists every invalid field", () => {
    expect(() =>
      parseColumnMapping({ municipality: -1, students: [{ gender: 3 }] }),
    ).toThrow(/^Invalid column mapping: municipality: .+; students\.0\.name: Required$/);
  });
});

describe("loadColumnMapping", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mapping-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns the default mapping without a path", () => {
    expect(loadColumnMapping("")).toBe(DEFAULT_COLUMN_MAPPING);
  });

  it("reads a mapping file", () => {
    const file = join(dir, "mapping.json");
    writeFileSync(file, JSON.stringify({ topic: 4, students: [{ name: 5, age: 6 }] }));

    expect(loadColumnMapping(file)).toEqual({
      topic: 4,
      students: [{ name: 5, age: 6 }],
    });
  });

  it("rejects malformed JSON", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "{ topic: 4");

    expect(() => loadColumnMapping(file)).toThrow(`Column mapping ${file} is not valid JSON`);
  });

  it("reports a missing file", () => {
    const file = join(dir, "missing.json");

    expect(() => loadColumnMapping(file)).toThrow(`Unable to read column mapping ${file}`);
  });

  it("ships an example file matching the built-in layout", () => {
    const example = join(process.cwd(), "examples", "column-mapping.json");

    expect(loadColumnMapping(example)).toEqual(DEFAULT_COLUMN_MAPPING);
  });
});
