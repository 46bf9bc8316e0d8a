import path from "node:path";
import { describe, expect, it } from "vitest";
import { CorruptFileError, UnsupportedFormatError } from "../src/errors";
import { FileTextExtractor } from "../src/extractor";
import { makeTempDir, writeDoc } from "./helpers";

describe("FileTextExtractor", () => {
  const extractor = new FileTextExtractor();

  it("reads text and markdown files as UTF-8", async () => {
    const dir = await makeTempDir();
    const txt = await writeDoc(dir, "csce629.txt", "CSCE 629 – Analysis of Algorithms");
    const md = await writeDoc(dir, "notes/README.MD", "# Degree plan\n");
    expect(await extractor.extractText(txt)).toBe("CSCE 629 – Analysis of Algorithms");
    expect(await extractor.extractText(md)).toBe("# Degree plan\n");
  });

  it("rejects unsupported formats", async () => {
    const dir = await makeTempDir();
    const csv = await writeDoc(dir, "grades.csv", "a,b");
    await expect(extractor.extractText(csv)).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it("reports an unparseable PDF as a corrupt file", async () => {
    const dir = await makeTempDir();
    const pdf = await writeDoc(dir, "broken.pdf", "this is not a pdf");
    await expect(extractor.extractText(pdf)).rejects.toBeInstanceOf(CorruptFileError);
  });

  it("recognises PDFs by extension", () => {
    expect(FileTextExtractor.isPdf(path.join("a", "Catalog.PDF"))).toBe(true);
    expect(FileTextExtractor.isPdf("catalog.txt")).toBe(false);
  });
});
