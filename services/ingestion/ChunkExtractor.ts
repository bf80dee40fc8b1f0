import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { BaseService } from '../base/BaseService';
import { ExtractionError } from '../base/ServiceError';
import { PdfParseResultSchema, PdfTextContentSchema, type PdfTextContent } from '../../shared/schemas/pdfSchemas';
import type { Chunk, ChunkingOptions, DocumentFormat, DocumentInput, TextUnit } from '../../shared/types';
import { splitText, validateChunkingOptions } from './SentenceSplitter';
import {
  BINARY_SNIFF_BYTES,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  MARKDOWN_EXTENSIONS,
  MARKDOWN_MIME_TYPES,
  PAGE_SEPARATOR,
  PDF_EXTENSIONS,
  PDF_MAGIC,
  PDF_MIME_TYPE,
  TEXT_EXTENSIONS,
} from './constants';

/** Extracts the text layer of a PDF, one entry per page. */
export type PdfTextParser = (data: Buffer) => Promise<{ pages: string[]; numpages?: number }>;

interface ChunkExtractorDeps {
  /** Defaults to pdf-parse, loaded on first use. */
  pdfParser?: PdfTextParser;
}

/** The part of a pdf.js page proxy that pdf-parse hands to `pagerender`. */
export interface PdfPageData {
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<unknown>;
}

/**
 * Join the text items of a page, starting a new line whenever the baseline
 * (`transform[5]`) moves.
 */
export function joinTextItems(content: PdfTextContent): string {
  let text = '';
  let lastY: number | undefined;
  for (const item of content.items) {
    if (item.str === undefined) continue;
    const y = item.transform?.[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

type RenderedPage = { text: string } | { error: unknown };

/**
 * pdf-parse concatenates pages into one string. `pagerender` is called once
 * per page in order, so the page texts are collected there instead.
 */
async function defaultPdfParser(data: Buffer): Promise<{ pages: string[]; numpages?: number }> {
  const { default: pdfParse } = await import('pdf-parse');
  const rendered: Promise<RenderedPage>[] = [];

  const result = PdfParseResultSchema.parse(await pdfParse(data, {
    pagerender: (pageData: PdfPageData) => {
      rendered.push(
        pageData
          .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
          .then(content => joinTextItems(PdfTextContentSchema.parse(content)))
          .then(
            (text): RenderedPage => ({ text }),
            (error: unknown): RenderedPage => ({ error })
          )
      );
      return '';
    },
  }));

  const pages: string[] = [];
  for (const page of await Promise.all(rendered)) {
    if ('error' in page) {
      throw page.error;
    }
    pages.push(page.text);
  }
  return { pages, numpages: result.numpages };
}

/**
 * Turns a document into sentence-aligned, overlapping chunks.
 */
export class ChunkExtractor extends BaseService<ChunkExtractorDeps> {
  private readonly options: ChunkingOptions;

  constructor(options: Partial<ChunkingOptions> = {}, deps: ChunkExtractorDeps = {}) {
    super('ChunkExtractor', deps);
    this.options = {
      chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
      chunkOverlap: options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP,
    };
    validateChunkingOptions(this.options);
  }

  get chunkingOptions(): ChunkingOptions {
    return { ...this.options };
  }

  /**
   * Extract and chunk a document.
   * @returns Chunks in document order, `chunkIndex` counting across pages
   * @throws ExtractionError
   */
  async extract(document: DocumentInput): Promise<Chunk[]> {
    return this.execute('extract', async () => {
      const sourceId = deriveSourceId(document);
      const units = await this.extractUnits(document);

      const chunks: Chunk[] = [];
      for (const unit of units) {
        for (const text of splitText(unit.text, this.options)) {
          chunks.push({ text, sourceId, chunkIndex: chunks.length, charLength: text.length });
        }
      }

      if (chunks.length === 0) {
        throw new ExtractionError('EMPTY_DOCUMENT', `Document '${sourceId}' has no extractable text`, { sourceId });
      }

      this.logDebug(`Extracted ${chunks.length} chunks from ${units.length} unit(s) of '${sourceId}'`);
      return chunks;
    }, { sourceId: document.sourceId, filePath: document.filePath });
  }

  /**
   * Extract the text of each logical unit (page). Units that are blank are
   * dropped.
   */
  async extractUnits(document: DocumentInput): Promise<TextUnit[]> {
    let format: DocumentFormat;
    let pages: string[];

    if (document.text !== undefined) {
      format = detectDeclaredFormat(document) ?? 'text';
      if (format === 'pdf') {
        throw new ExtractionError('UNSUPPORTED_FORMAT', 'PDF content must be supplied as bytes or a file path');
      }
      pages = document.text.split(PAGE_SEPARATOR);
    } else {
      const bytes = await this.readBytes(document);
      format = detectFormat(document, bytes);
      pages = format === 'pdf' ? await this.extractPdfPages(bytes) : decodeText(bytes).split(PAGE_SEPARATOR);
    }

    const units = pages
      .map((unitText, unitIndex) => ({ unitIndex, text: unitText }))
      .filter(unit => unit.text.trim().length > 0);

    if (units.length === 0) {
      throw new ExtractionError('EMPTY_DOCUMENT', 'Document contains only whitespace', {
        sourceId: document.sourceId,
        format,
      });
    }
    return units;
  }

  private async readBytes(document: DocumentInput): Promise<Buffer> {
    if (document.contentBase64 !== undefined) {
      return Buffer.from(document.contentBase64, 'base64');
    }
    if (document.filePath === undefined) {
      throw new ExtractionError('SOURCE_UNREADABLE', 'Document has no content: provide filePath, text or contentBase64');
    }
    try {
      return await fs.promises.readFile(document.filePath);
    } catch (error) {
      throw new ExtractionError(
        'SOURCE_UNREADABLE',
        `Cannot read '${document.filePath}': ${error instanceof Error ? error.message : String(error)}`,
        { filePath: document.filePath }
      );
    }
  }

  private async extractPdfPages(bytes: Buffer): Promise<string[]> {
    const parse = this.deps.pdfParser ?? defaultPdfParser;
    try {
      const result = await parse(bytes);
      this.logDebug(`Parsed PDF with ${result.numpages ?? result.pages.length} page(s)`);
      return result.pages;
    } catch (error) {
      throw new ExtractionError(
        'CORRUPT_DOCUMENT',
        `PDF could not be parsed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/**
 * Stable source id: the explicit `sourceId`, else the file path, else a
 * SHA-256 of the content.
 */
export function deriveSourceId(document: DocumentInput): string {
  if (document.sourceId) {
    return document.sourceId;
  }
  if (document.filePath) {
    return path.normalize(document.filePath);
  }
  const content = document.contentBase64 !== undefined
    ? Buffer.from(document.contentBase64, 'base64')
    : Buffer.from(document.text ?? '', 'utf8');
  return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}

function extensionOf(document: DocumentInput): string | undefined {
  const name = document.fileName ?? document.filePath;
  return name === undefined ? undefined : path.extname(name).toLowerCase();
}

/**
 * Format declared by mime type or file extension, if any.
 * @throws ExtractionError(UNSUPPORTED_FORMAT) for declared non-text formats
 */
function detectDeclaredFormat(document: DocumentInput): DocumentFormat | undefined {
  const mime = document.mimeType?.toLowerCase().split(';')[0].trim();
  if (mime) {
    if (mime === PDF_MIME_TYPE) return 'pdf';
    if (MARKDOWN_MIME_TYPES.includes(mime)) return 'markdown';
    if (mime.startsWith('text/')) return 'text';
    if (mime !== 'application/octet-stream') {
      throw new ExtractionError('UNSUPPORTED_FORMAT', `Unsupported mime type '${document.mimeType}'`);
    }
  }

  const ext = extensionOf(document);
  if (ext === undefined) return undefined;
  if (PDF_EXTENSIONS.includes(ext)) return 'pdf';
  if (MARKDOWN_EXTENSIONS.includes(ext)) return 'markdown';
  if (TEXT_EXTENSIONS.includes(ext)) return ext === '' ? undefined : 'text';
  throw new ExtractionError('UNSUPPORTED_FORMAT', `Unsupported file extension '${ext}'`);
}

export function detectFormat(document: DocumentInput, bytes: Buffer): DocumentFormat {
  if (bytes.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC) {
    return 'pdf';
  }
  const declared = detectDeclaredFormat(document);
  if (declared === 'pdf') {
    throw new ExtractionError('CORRUPT_DOCUMENT', 'Document is declared as PDF but has no PDF header');
  }
  if (bytes.subarray(0, BINARY_SNIFF_BYTES).includes(0)) {
    throw new ExtractionError('UNSUPPORTED_FORMAT', 'Document looks binary and is not a PDF');
  }
  return declared ?? 'text';
}

function decodeText(bytes: Buffer): string {
  const text = bytes.toString('utf8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
