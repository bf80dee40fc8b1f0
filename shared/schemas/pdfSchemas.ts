import { z } from 'zod';

/**
 * Subset of the pdf-parse result the extractor relies on
 */
export const PdfParseResultSchema = z.object({
  text: z.string(),
  numpages: z.number().optional(),
  info: z.record(z.unknown()).optional(),
}).passthrough();

export type PdfParseResult = z.infer<typeof PdfParseResultSchema>;

/**
 * Text content of one page as pdf.js reports it. Marked-content entries
 * carry no `str` and are skipped.
 */
export const PdfTextContentSchema = z.object({
  items: z.array(z.object({
    str: z.string().optional(),
    transform: z.array(z.number()).optional(),
  }).passthrough()),
});

export type PdfTextContent = z.infer<typeof PdfTextContentSchema>;
