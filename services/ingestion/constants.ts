// Chunking defaults
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export const DEFAULT_COLLECTION_NAME = 'docs';

// Step names of an ingest job, in execution order
export const INGEST_STEPS = {
  EXTRACT: 'extract-chunks',
  EMBED: 'embed-chunks',
  UPSERT: 'upsert-records',
} as const;

export type IngestStepName = typeof INGEST_STEPS[keyof typeof INGEST_STEPS];

// Format detection
export const PDF_MAGIC = '%PDF-';
export const PDF_MIME_TYPE = 'application/pdf';
export const MARKDOWN_MIME_TYPES = ['text/markdown', 'text/x-markdown'];
export const PDF_EXTENSIONS = ['.pdf'];
export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];
export const TEXT_EXTENSIONS = ['', '.txt', '.text', '.log', '.csv', '.rst'];

// Bytes inspected when sniffing for binary content
export const BINARY_SNIFF_BYTES = 8192;

// Logical units (pages) of plain text are separated by form feeds
export const PAGE_SEPARATOR = '\f';
