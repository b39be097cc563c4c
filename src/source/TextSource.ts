/**
 * ContractExtractor – Text source abstraction
 *
 * A TextSource turns one input document into raw page text. Converting
 * PDFs is outside this package; plug a converter in behind this
 * interface and it receives a run-scoped scratch directory to work in.
 */

import type { ContractDocument } from "../types";

export interface TextSourceContext {
  /** Temporary directory owned by the current batch run */
  workDir: string;
}

export interface TextSource {
  /** Unique source identifier */
  readonly name: string;

  /**
   * Materialise the document's text.
   * Must throw TextSourceError when the document cannot be read.
   */
  readText(doc: ContractDocument, context: TextSourceContext): Promise<string>;
}

export class TextSourceError extends Error {
  constructor(
    message: string,
    public readonly fileName: string,
    public readonly cause?: unknown,
  ) {
    super(`[Source:${fileName}] ${message}`);
    this.name = "TextSourceError";
  }
}

// ─── Default source ──────────────────────────────────────────────────────────

/**
 * Plain text, or UTF-8 bytes. Form feeds (page breaks in text exports)
 * become newlines and a leading byte-order mark is dropped.
 */
export class Utf8TextSource implements TextSource {
  readonly name = "utf8";
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  async readText(
    doc: ContractDocument,
    _context?: TextSourceContext,
  ): Promise<string> {
    let text: string;
    if (typeof doc.content === "string") {
      text = doc.content;
    } else {
      try {
        text = this.decoder.decode(doc.content);
      } catch (err) {
        throw new TextSourceError(
          "Content is not valid UTF-8",
          doc.fileName,
          err,
        );
      }
    }
    return text.replace(/^\uFEFF/, "").replace(/\f/g, "\n");
  }
}
