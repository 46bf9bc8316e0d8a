/**
 * Document text extraction.
 *
 * Plain-text formats are read as UTF-8; PDFs go through pdf-parse. Anything
 * else is rejected so the indexer can log and skip the file.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { CorruptFileError, UnsupportedFormatError } from "./errors";

export interface TextExtractor {
  /**
   * @throws {UnsupportedFormatError} for file types the extractor cannot read.
   * @throws {CorruptFileError} when a supported file cannot be parsed.
   */
  extractText(absPath: string): Promise<string>;
}

const TEXT_EXTENSIONS = new Set([".txt", ".md"]);

export class FileTextExtractor implements TextExtractor {
  public async extractText(absPath: string): Promise<string> {
    const ext = path.extname(absPath).toLowerCase();
    if (TEXT_EXTENSIONS.has(ext)) return fs.readFile(absPath, "utf8");
    if (FileTextExtractor.isPdf(absPath)) return this.extractPdf(absPath);
    throw new UnsupportedFormatError(absPath);
  }

  private async extractPdf(absPath: string): Promise<string> {
    const data = await fs.readFile(absPath);
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return result.text;
    } catch (e) {
      throw new CorruptFileError(absPath, e);
    } finally {
      await parser.destroy();
    }
  }

  /** Case-insensitive `.pdf` extension check. */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
