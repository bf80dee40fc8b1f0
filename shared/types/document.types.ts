/**
 * Ingestion input. Exactly one of `filePath`, `text` or `contentBase64`
 * carries the content; the rest is metadata used for format detection and
 * source id derivation.
 */
export interface DocumentInput {
  /** Stable identifier. Derived from the path or content hash when absent. */
  sourceId?: string;
  filePath?: string;
  text?: string;
  contentBase64?: string;
  mimeType?: string;
  fileName?: string;
}

export type DocumentFormat = 'text' | 'markdown' | 'pdf';

/** A logical unit of extracted text, e.g. one page. */
export interface TextUnit {
  unitIndex: number;
  text: string;
}
